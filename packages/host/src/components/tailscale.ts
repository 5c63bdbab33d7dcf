/**
 * Tailscale
 *
 * Installs the client with the vendor script (curl | sh), enables
 * tailscaled, then brings the node up with the auth key of the chosen mode:
 *
 * - ephemeral:  `tailscale up --auth-key=... --ephemeral --ssh`
 * - persistent: `tailscale up --auth-key=... --ssh`
 *
 * A node that already reports "Logged in as" is left alone.
 */

import { ActivationError, FetchError, InstallError, type SecretKey } from "@boxprep/shared";
import { commandExists, firstLine, run } from "../lib/command.js";
import { enableAndStart } from "../services/activator.js";
import type { Component, ComponentResult, InstallContext } from "./types.js";

export type TailscaleMode = "ephemeral" | "persistent";

export const TAILSCALED_UNIT = "tailscaled.service";

const MODE_SECRET: Record<TailscaleMode, SecretKey> = {
    ephemeral: "authKeyEphemeral",
    persistent: "authKeyPersistent",
};

/**
 * Installs the client if missing and makes sure tailscaled is running
 */
export async function ensureTailscale({ config, logger }: InstallContext): Promise<void> {
    if (!(await commandExists("tailscale"))) {
        const url = config.tailscale.installScriptUrl;
        logger.info("Installing Tailscale (official script)...");

        const script = await run("curl", ["-fsSL", url]);
        if (script.exitCode !== 0 || !script.stdout.trim()) {
            throw new FetchError(`Failed to download Tailscale install script: ${url}`, {
                exitCode: script.exitCode,
            });
        }

        const install = await run("sh", [], { input: script.stdout, inherit: true });
        if (install.exitCode !== 0) {
            throw new InstallError("Tailscale install script failed.", {
                exitCode: install.exitCode,
            });
        }
    } else {
        const { stdout } = await run("tailscale", ["--version"]);
        logger.warn(`Tailscale already installed: ${firstLine(stdout) || "unknown version"}`);
    }

    await enableAndStart(TAILSCALED_UNIT, logger);
}

export async function isLoggedIn(): Promise<boolean> {
    const { stdout } = await run("tailscale", ["status"]);
    return stdout.includes("Logged in as");
}

/**
 * IPv4 address(es) of this node, space-separated
 */
export async function currentIpv4(): Promise<string> {
    const { exitCode, stdout } = await run("tailscale", ["ip", "-4"]);
    if (exitCode !== 0) return "unknown";
    return stdout.split("\n").map((line) => line.trim()).filter(Boolean).join(" ") || "unknown";
}

export function upArgs(mode: TailscaleMode, authKey: string): string[] {
    return ["up", `--auth-key=${authKey}`, ...(mode === "ephemeral" ? ["--ephemeral"] : []), "--ssh"];
}

export async function bringUpTailscale(
    mode: TailscaleMode,
    context: InstallContext
): Promise<ComponentResult> {
    const { config, logger } = context;

    await ensureTailscale(context);

    if (await isLoggedIn()) {
        logger.warn("Tailscale already logged in. Skipping 'tailscale up'.");
        const ip = await currentIpv4();
        logger.info(`Tailscale IPv4: ${ip}`);
        return { status: "already-installed", message: `logged in, IPv4 ${ip}` };
    }

    const authKey = config.tailscale[MODE_SECRET[mode]];
    if (!authKey) {
        throw new ActivationError(`No auth key configured for ${mode} mode.`);
    }

    logger.info(`Bringing up Tailscale (${mode.toUpperCase()}) with SSH...`);
    const { exitCode } = await run("tailscale", upArgs(mode, authKey), {
        privileged: true,
        inherit: true,
    });
    if (exitCode !== 0) {
        throw new ActivationError(`tailscale up (${mode}) failed.`, { exitCode });
    }

    const ip = await currentIpv4();
    logger.log(`Tailscale UP (${mode}). IPv4: ${ip}`);
    return { status: "installed", message: `${mode}, IPv4 ${ip}` };
}

export const tailscaleEphemeral: Component = {
    id: "tailscale-ephemeral",
    label: "Tailscale (Ephemeral)",
    description: "Install & bring up Tailscale (ephemeral key)",
    defaultSelected: false,
    requiresRoot: true,
    secrets: [MODE_SECRET.ephemeral],
    install: (context) => bringUpTailscale("ephemeral", context),
};

export const tailscalePersistent: Component = {
    id: "tailscale-persistent",
    label: "Tailscale (Persistent)",
    description: "Install & bring up Tailscale (persistent key)",
    defaultSelected: true,
    requiresRoot: true,
    secrets: [MODE_SECRET.persistent],
    install: (context) => bringUpTailscale("persistent", context),
};
