/**
 * Input Leap
 *
 * Installs the native .deb from the GitHub release through apt so that
 * its dependencies are resolved. Skipped when `input-leap` is on PATH.
 */

import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { FetchError, InstallError } from "@boxprep/shared";
import { firstLine, run, which } from "../lib/command.js";
import type { Component, ComponentResult, InstallContext } from "./types.js";

const BINARY = "input-leap";

/**
 * Scratch location for a downloaded artifact, named after the URL's last path segment
 */
export function scratchPathFor(url: string): string {
    const name = basename(decodeURIComponent(new URL(url).pathname)) || "download";
    return join(tmpdir(), name);
}

async function installedVersion(): Promise<string> {
    const { exitCode, stdout } = await run(BINARY, ["--version"]);
    return (exitCode === 0 && firstLine(stdout)) || "unknown";
}

export async function installInputLeap({ config, logger }: InstallContext): Promise<ComponentResult> {
    const existing = await which(BINARY);
    if (existing) {
        logger.warn(`Input Leap already installed: ${existing}`);
        return { status: "already-installed", message: existing };
    }

    const { version, debUrl } = config.inputLeap;
    const deb = scratchPathFor(debUrl);

    try {
        logger.info(`Downloading Input Leap ${version}...`);
        const download = await run("wget", ["-q", "--show-progress", "-O", deb, debUrl], {
            inherit: true,
        });
        if (download.exitCode !== 0) {
            throw new FetchError(`Download failed: ${debUrl}`, { exitCode: download.exitCode });
        }

        logger.info("Installing Input Leap via apt (resolves dependencies)...");
        const install = await run("apt", ["install", "-y", deb], {
            privileged: true,
            inherit: true,
        });
        if (install.exitCode !== 0) {
            throw new InstallError(`apt install failed for ${deb}`, { exitCode: install.exitCode });
        }
    } finally {
        await rm(deb, { force: true });
    }

    const reported = await installedVersion();
    logger.log(`Input Leap installed. Version: ${reported}`);
    return { status: "installed", message: `version ${reported}` };
}

export const inputLeap: Component = {
    id: "inputleap",
    label: "Input Leap",
    description: "Install Input Leap native .deb",
    defaultSelected: true,
    requiresRoot: true,
    secrets: [],
    install: installInputLeap,
};
