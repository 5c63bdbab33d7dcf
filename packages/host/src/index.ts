export * from "./config/index.js";
export * from "./components/index.js";
export * from "./prober/index.js";
export * from "./services/activator.js";
export * from "./dispatcher.js";
export { asPrivileged, commandExists, which, run, type RunOptions, type RunResult } from "./lib/command.js";
