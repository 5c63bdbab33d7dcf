/**
 * Run orchestration
 *
 * Loads configuration, resolves the selection through one of the front-ends,
 * runs the preflight checks and hands the selection to the dispatcher.
 *
 * Exit codes:
 *   0  all selected components succeeded or were already present (or nothing was selected)
 *   1  fatal: invalid/missing configuration, no elevated access, unsupported platform,
 *      prerequisite install failure
 *   2  at least one component failed
 */

import { createInterface, type Interface } from "node:readline";
import {
    errorMessage,
    isFatal,
    logger as defaultLogger,
    type BoxprepConfig,
    type Logger,
    type Selection,
} from "@boxprep/shared";
import {
    COMPONENT_REGISTRY,
    dispatch,
    hasFailures,
    listComponents,
    loadConfig,
    preflight,
    requireSecrets,
    summarize,
} from "@boxprep/host";
import { canonicalSelection, parseAppList } from "../selection/direct.js";
import { checklistSelection } from "../selection/checklist.js";
import { numberedMenu } from "../selection/numbered.js";
import type { MenuStrategy } from "../selection/index.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_COMPONENT_FAILED = 2;

export interface RunOptions {
    all?: boolean;
    /** Space-separated component identifiers */
    apps?: string;
    menu?: MenuStrategy;
    strictPlatform?: boolean;
    /** Unrecognized command-line tokens, warned about and ignored */
    unknownOptions?: readonly string[];
    env?: NodeJS.ProcessEnv;
    /** Whether stdin/stdout are a terminal; picks the checklist by default */
    interactive?: boolean;
    /** Lines for the numbered menu (defaults to stdin) */
    input?: AsyncIterable<string>;
}

/**
 * Installs one selection and returns its exit code
 */
async function installSelection(
    selection: Selection,
    config: BoxprepConfig,
    logger: Logger
): Promise<number> {
    if (selection.length === 0) {
        logger.warn("Nothing selected.");
        return EXIT_OK;
    }

    const components = selection.map((id) => COMPONENT_REGISTRY[id]);

    try {
        requireSecrets(
            config,
            components.map((component) => ({ requiredBy: component.id, secrets: component.secrets }))
        );
        await preflight(components, config, logger);
    } catch (error) {
        if (isFatal(error)) {
            logger.error(errorMessage(error));
            return EXIT_FATAL;
        }
        throw error;
    }

    const outcomes = await dispatch(selection, { config, logger });
    summarize(outcomes, logger);
    return hasFailures(outcomes) ? EXIT_COMPONENT_FAILED : EXIT_OK;
}

async function runNumberedMenu(
    config: BoxprepConfig,
    logger: Logger,
    input?: AsyncIterable<string>
): Promise<number> {
    let rl: Interface | undefined;
    let lines = input;
    if (!lines) {
        rl = createInterface({ input: process.stdin, terminal: false });
        lines = rl;
    }

    let exitCode = EXIT_OK;
    try {
        for await (const selection of numberedMenu(lines, listComponents(), { logger })) {
            const code = await installSelection(selection, config, logger);
            if (code === EXIT_FATAL) return code;
            exitCode = Math.max(exitCode, code);
        }
    } finally {
        rl?.close();
    }
    return exitCode;
}

export async function runBoxprep(
    options: RunOptions = {},
    logger: Logger = defaultLogger
): Promise<number> {
    for (const token of options.unknownOptions ?? []) {
        logger.warn(`Unknown option: ${token}`);
    }

    logger.log("boxprep bootstrap starting...");

    let config: BoxprepConfig;
    try {
        config = loadConfig(options.env ?? process.env, {
            platformMode: options.strictPlatform ? "strict" : undefined,
        });
    } catch (error) {
        logger.error(errorMessage(error));
        return EXIT_FATAL;
    }

    if (options.apps !== undefined || options.all) {
        const selection =
            options.apps !== undefined ? parseAppList(options.apps, logger) : canonicalSelection();
        const code = await installSelection(selection, config, logger);
        if (code !== EXIT_FATAL) logger.log("Done.");
        return code;
    }

    const interactive = options.interactive ?? Boolean(process.stdin.isTTY && process.stdout.isTTY);
    const strategy: MenuStrategy = options.menu ?? (interactive ? "checklist" : "numbered");

    let code: number;
    if (strategy === "checklist") {
        const selection = await checklistSelection(listComponents(), logger);
        code = await installSelection(selection, config, logger);
    } else {
        if (!interactive) {
            logger.warn("No interactive terminal; falling back to the numbered menu.");
        }
        code = await runNumberedMenu(config, logger, options.input);
    }

    if (code !== EXIT_FATAL) logger.log("All selected tasks completed.");
    return code;
}
