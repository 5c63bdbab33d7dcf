/**
 * yargs setup for the boxprep entry point
 */

import yargs from "yargs";
import { listComponents } from "@boxprep/host";
import { bootstrapCommand } from "./commands/bootstrap.js";

export function componentTable(): string {
    const rows = listComponents().map(
        (component) => `  ${component.id.padEnd(25)}${component.description}`
    );
    return ["Components:", ...rows].join("\n");
}

const SECRETS_NOTE =
    "Tailscale components need TS_AUTHKEY_EPHEMERAL or TS_AUTHKEY_PERSISTENT in the environment, " +
    "even when the node is already logged in.";

export function buildCli(rawArgs: string[]) {
    return (
        yargs(rawArgs)
            .scriptName("boxprep")
            .usage('Usage: $0 [--all] [--apps "inputleap tailscale-ephemeral ..."]')
            // Repeated flags keep the last value; --no-* and camelCase forms are unknown options
            .parserConfiguration({
                "duplicate-arguments-array": false,
                "boolean-negation": false,
                "camel-case-expansion": false,
            })
            .command(bootstrapCommand(rawArgs))
            .example("$0", "Interactive menu")
            .example("$0 --all", "Install the canonical set without prompting")
            .example('$0 --apps "inputleap tailscale-ephemeral"', "Install exactly these components")
            .epilogue(`${componentTable()}\n\n${SECRETS_NOTE}`)
            .help()
            .alias("h", "help")
            .version("1.0.0")
            .alias("v", "version")
    );
}
