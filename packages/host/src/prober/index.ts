/**
 * Environment Prober
 *
 * Preconditions checked once per run, before any installer:
 * elevated access, a Debian-family base, and the basic tools the
 * installers shell out to. All failures here are fatal.
 */

import { readFile } from "node:fs/promises";
import {
    OS_RELEASE_PATH,
    PermissionDeniedError,
    PrerequisiteError,
    UnsupportedPlatformError,
    describeDistribution,
    isDebianFamily,
    isRoot,
    logger as defaultLogger,
    parseOsRelease,
    type BoxprepConfig,
    type Logger,
    type OsRelease,
    type PlatformMode,
} from "@boxprep/shared";
import { commandExists, run } from "../lib/command.js";
import type { Component } from "../components/types.js";

/**
 * Tools the installers expect on PATH
 */
export const PREREQUISITE_TOOLS = ["curl", "wget", "grep", "sed", "awk"] as const;

/**
 * Installs any missing tools via apt. Returns the names that were installed.
 */
export async function ensureTools(
    names: readonly string[] = PREREQUISITE_TOOLS,
    logger: Logger = defaultLogger
): Promise<string[]> {
    const missing: string[] = [];
    for (const name of names) {
        if (!(await commandExists(name))) {
            missing.push(name);
        }
    }

    if (missing.length === 0) {
        return [];
    }

    logger.info(`Installing prerequisites: ${missing.join(" ")}`);

    // A stale index is not fatal; the install below decides
    const update = await run("apt", ["update", "-y"], { privileged: true, inherit: true });
    if (update.exitCode !== 0) {
        logger.warn("apt update failed; continuing with the current package index.");
    }

    const install = await run("apt", ["install", "-y", ...missing], {
        privileged: true,
        inherit: true,
    });
    if (install.exitCode !== 0) {
        throw new PrerequisiteError(`Failed to install prerequisites: ${missing.join(", ")}`, {
            missing,
            exitCode: install.exitCode,
        });
    }

    return missing;
}

/**
 * Reads and parses os-release. Returns null if the file is missing or unreadable.
 */
export async function readOsRelease(path: string = OS_RELEASE_PATH): Promise<OsRelease | null> {
    try {
        return parseOsRelease(await readFile(path, "utf-8"));
    } catch {
        return null;
    }
}

/**
 * Checks the host is Debian-family.
 *
 * A missing os-release always fails. A non-Debian base only warns in
 * lenient mode and fails in strict mode.
 */
export async function assertSupportedPlatform(
    mode: PlatformMode,
    logger: Logger = defaultLogger,
    path: string = OS_RELEASE_PATH
): Promise<OsRelease> {
    const release = await readOsRelease(path);
    if (!release) {
        throw new UnsupportedPlatformError(`${path} missing: unsupported base.`, { path });
    }

    if (!isDebianFamily(release)) {
        const id = release.ID ?? "unknown";
        if (mode === "strict") {
            throw new UnsupportedPlatformError(
                `Non Debian/Ubuntu base detected (${id}). Refusing to continue in strict mode.`,
                { id }
            );
        }
        logger.warn(`Non Debian/Ubuntu base detected (${id}). Installation may fail.`);
    } else {
        logger.info(`Detected ${describeDistribution(release)}`);
    }

    return release;
}

/**
 * Verifies sudo works (prompting for a password if needed). Root passes immediately.
 */
export async function ensureElevatedAccess(): Promise<void> {
    if (isRoot()) return;

    const { exitCode } = await run("sudo", ["-v"], { inherit: true });
    if (exitCode !== 0) {
        throw new PermissionDeniedError("sudo permission required.", { exitCode });
    }
}

/**
 * Runs the fatal checks for the components about to be installed.
 * Nothing is checked when none of them needs root.
 */
export async function preflight(
    components: readonly Component[],
    config: BoxprepConfig,
    logger: Logger = defaultLogger
): Promise<void> {
    if (!components.some((component) => component.requiresRoot)) {
        return;
    }

    await ensureElevatedAccess();
    await assertSupportedPlatform(config.platformMode, logger);
    await ensureTools(PREREQUISITE_TOOLS, logger);
}
