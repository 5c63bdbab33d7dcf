/**
 * Service Activator
 *
 * Enables and starts a systemd unit when the init system knows about it.
 * Never throws: a missing unit is a no-op and a failed start only warns.
 */

import { logger as defaultLogger, type Logger } from "@boxprep/shared";
import { run } from "../lib/command.js";

export type ActivationStatus = "started" | "not-found" | "failed";

/**
 * Returns true if `systemctl list-unit-files` lists the unit
 */
export async function isUnitKnown(unit: string): Promise<boolean> {
    const { exitCode, stdout } = await run("systemctl", ["list-unit-files", "--no-pager"]);
    if (exitCode !== 0) return false;
    return stdout.split("\n").some((line) => line.split(/\s+/)[0] === unit);
}

export async function enableAndStart(
    unit: string,
    logger: Logger = defaultLogger
): Promise<ActivationStatus> {
    if (!(await isUnitKnown(unit))) {
        return "not-found";
    }

    const { exitCode } = await run("systemctl", ["enable", "--now", unit], { privileged: true });
    if (exitCode !== 0) {
        logger.warn(`Failed to enable/start ${unit}.`);
        return "failed";
    }
    return "started";
}
