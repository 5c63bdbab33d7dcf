/**
 * Default command: install the selected components
 */

import type { CommandModule } from "yargs";
import { runBoxprep } from "./run.js";
import { isMenuStrategy } from "../selection/index.js";
import { findUnknownOptions } from "../utils/options.utils.js";

export interface BootstrapArgs {
    all: boolean;
    apps?: string;
    menu?: string;
    "strict-platform"?: boolean;
}

export function bootstrapCommand(rawArgs: readonly string[]): CommandModule<object, BootstrapArgs> {
    return {
        command: "$0",
        describe: "Install the selected components",
        builder: {
            all: {
                type: "boolean",
                description:
                    "Install the canonical set (inputleap, remove-flatpak-inputleap, tailscale-persistent)",
                default: false,
            },
            apps: {
                type: "string",
                description: "Space-separated component identifiers to install, in order",
            },
            menu: {
                type: "string",
                description: "Interactive menu style: checklist or numbered",
            },
            "strict-platform": {
                type: "boolean",
                description: "Abort on a non Debian/Ubuntu base instead of warning",
            },
        },
        handler: async (argv) => {
            const unknownOptions = findUnknownOptions(rawArgs);
            const menu = argv.menu;
            if (menu !== undefined && !isMenuStrategy(menu)) {
                unknownOptions.push(`--menu ${menu}`);
            }

            process.exitCode = await runBoxprep({
                all: argv.all,
                apps: argv.apps,
                menu: menu !== undefined && isMenuStrategy(menu) ? menu : undefined,
                strictPlatform: argv["strict-platform"],
                unknownOptions,
            });
        },
    };
}
