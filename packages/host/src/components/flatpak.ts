/**
 * Removes the Flatpak build of Input Leap so it does not coexist with the
 * native package. Absence and uninstall failures are both non-fatal.
 */

import { commandExists, run } from "../lib/command.js";
import type { Component, ComponentResult, InstallContext } from "./types.js";

export const FLATPAK_APP_ID = "io.github.input_leap.input-leap";

async function isFlatpakInstalled(appId: string): Promise<boolean> {
    if (!(await commandExists("flatpak"))) return false;

    const { exitCode, stdout } = await run("flatpak", ["list", "--app", "--columns=application"]);
    if (exitCode !== 0) return false;

    const wanted = appId.toLowerCase();
    return stdout.split("\n").some((line) => line.trim().toLowerCase() === wanted);
}

export async function removeFlatpakInputLeap({ logger }: InstallContext): Promise<ComponentResult> {
    if (!(await isFlatpakInstalled(FLATPAK_APP_ID))) {
        return { status: "not-present", message: "no Flatpak Input Leap found" };
    }

    logger.info("Removing Flatpak Input Leap to avoid conflicts...");
    const { exitCode } = await run("flatpak", ["uninstall", "-y", FLATPAK_APP_ID], {
        inherit: true,
    });
    if (exitCode !== 0) {
        logger.warn("Flatpak uninstall failed (non-fatal).");
        return { status: "skipped", message: `flatpak uninstall exited with ${exitCode}` };
    }

    logger.log("Flatpak Input Leap removed.");
    return { status: "removed", message: FLATPAK_APP_ID };
}

export const removeFlatpak: Component = {
    id: "remove-flatpak-inputleap",
    label: "Remove Flatpak Input Leap",
    description: "Remove Flatpak Input Leap if present",
    defaultSelected: true,
    requiresRoot: false,
    secrets: [],
    install: removeFlatpakInputLeap,
};
