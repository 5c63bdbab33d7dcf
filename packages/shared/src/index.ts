export * from "./platform.js";
export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
