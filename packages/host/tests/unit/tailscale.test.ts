/**
 * Unit tests for the Tailscale installers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockExeca } = vi.hoisted(() => ({
    mockExeca: vi.fn(),
}));

vi.mock("execa", () => ({
    execa: mockExeca,
}));

import type { BoxprepConfig } from "@boxprep/shared";
import {
    bringUpTailscale,
    tailscaleEphemeral,
    tailscalePersistent,
    upArgs,
} from "../../src/components/tailscale.js";
import { commandLines, fakeLogger, fakeShell, type FakeRoute } from "../fake-shell.js";

const SCRIPT = "#!/bin/sh\necho installing tailscale\n";

const config: BoxprepConfig = {
    inputLeap: { version: "3.0.2", debUrl: "https://example.com/InputLeap_3.0.2.deb" },
    tailscale: {
        installScriptUrl: "https://example.com/install.sh",
        authKeyEphemeral: "test-ephemeral-key",
        authKeyPersistent: "test-persistent-key",
    },
    platformMode: "lenient",
};

const UNIT_LIST = {
    "systemctl list-unit-files --no-pager": {
        stdout: "tailscaled.service    enabled    enabled\n",
    },
    "sudo systemctl enable --now tailscaled.service": {},
};

function freshHost(extra: Record<string, FakeRoute> = {}) {
    return fakeShell({
        "curl -fsSL https://example.com/install.sh": { stdout: SCRIPT },
        sh: {},
        ...UNIT_LIST,
        "tailscale status": { exitCode: 1, stdout: "Logged out." },
        "tailscale ip -4": { stdout: "100.64.0.1\n" },
        ...extra,
    });
}

describe("Tailscale installers", () => {
    beforeEach(() => {
        mockExeca.mockReset();
        vi.spyOn(process, "getuid").mockReturnValue(1000);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("upArgs()", () => {
        it("should add --ephemeral only in ephemeral mode", () => {
            expect(upArgs("ephemeral", "k")).toEqual(["up", "--auth-key=k", "--ephemeral", "--ssh"]);
            expect(upArgs("persistent", "k")).toEqual(["up", "--auth-key=k", "--ssh"]);
        });
    });

    it("should install, enable the daemon and come up in persistent mode", async () => {
        const logger = fakeLogger();
        mockExeca.mockImplementation(
            freshHost({ "sudo tailscale up --auth-key=test-persistent-key --ssh": {} })
        );

        const result = await tailscalePersistent.install({ config, logger });

        expect(result).toEqual({ status: "installed", message: "persistent, IPv4 100.64.0.1" });
        expect(commandLines(mockExeca)).toEqual([
            "which tailscale",
            "curl -fsSL https://example.com/install.sh",
            "sh",
            "systemctl list-unit-files --no-pager",
            "sudo systemctl enable --now tailscaled.service",
            "tailscale status",
            "sudo tailscale up --auth-key=test-persistent-key --ssh",
            "tailscale ip -4",
        ]);
        expect(mockExeca).toHaveBeenCalledWith("sh", [], expect.objectContaining({ input: SCRIPT }));
        expect(logger.log).toHaveBeenCalledWith("Tailscale UP (persistent). IPv4: 100.64.0.1");
    });

    it("should pass --ephemeral and the ephemeral key in ephemeral mode", async () => {
        mockExeca.mockImplementation(
            freshHost({ "sudo tailscale up --auth-key=test-ephemeral-key --ephemeral --ssh": {} })
        );

        const result = await tailscaleEphemeral.install({ config, logger: fakeLogger() });

        expect(result).toEqual({ status: "installed", message: "ephemeral, IPv4 100.64.0.1" });
    });

    it.each(["ephemeral", "persistent"] as const)(
        "should skip re-authentication in %s mode when already logged in",
        async (mode) => {
            const logger = fakeLogger();
            mockExeca.mockImplementation(
                fakeShell({
                    "which tailscale": { stdout: "/usr/bin/tailscale" },
                    "tailscale --version": { stdout: "1.76.1\n  tailscale commit: abc123\n" },
                    ...UNIT_LIST,
                    "tailscale status": {
                        stdout: "100.64.0.7  box  test@  linux  -\n# Logged in as test@example.com\n",
                    },
                    "tailscale ip -4": { stdout: "100.64.0.7\n" },
                })
            );

            const result = await bringUpTailscale(mode, { config, logger });

            expect(result).toEqual({
                status: "already-installed",
                message: "logged in, IPv4 100.64.0.7",
            });
            expect(logger.warn).toHaveBeenCalledWith("Tailscale already installed: 1.76.1");
            expect(logger.warn).toHaveBeenCalledWith(
                "Tailscale already logged in. Skipping 'tailscale up'."
            );
            expect(logger.info).toHaveBeenCalledWith("Tailscale IPv4: 100.64.0.7");
            const lines = commandLines(mockExeca);
            expect(lines.some((line) => line.startsWith("sudo tailscale up"))).toBe(false);
            expect(lines.some((line) => line.startsWith("curl"))).toBe(false);
        }
    );

    it("should still bring the node up when tailscaled is not a known unit", async () => {
        mockExeca.mockImplementation(
            freshHost({
                "systemctl list-unit-files --no-pager": { stdout: "ssh.service enabled enabled\n" },
                "sudo tailscale up --auth-key=test-persistent-key --ssh": {},
            })
        );

        const result = await tailscalePersistent.install({ config, logger: fakeLogger() });

        expect(result.status).toBe("installed");
        expect(commandLines(mockExeca)).not.toContain(
            "sudo systemctl enable --now tailscaled.service"
        );
    });

    it("should raise FetchError when the install script cannot be downloaded", async () => {
        mockExeca.mockImplementation(
            freshHost({ "curl -fsSL https://example.com/install.sh": { exitCode: 22 } })
        );

        await expect(
            tailscalePersistent.install({ config, logger: fakeLogger() })
        ).rejects.toMatchObject({
            name: "FetchError",
            message: "Failed to download Tailscale install script: https://example.com/install.sh",
        });
        expect(commandLines(mockExeca)).not.toContain("sh");
    });

    it("should raise InstallError when the install script fails", async () => {
        mockExeca.mockImplementation(freshHost({ sh: { exitCode: 1 } }));

        await expect(
            tailscalePersistent.install({ config, logger: fakeLogger() })
        ).rejects.toMatchObject({ name: "InstallError", message: "Tailscale install script failed." });
    });

    it("should raise ActivationError without leaking the auth key", async () => {
        mockExeca.mockImplementation(
            freshHost({ "sudo tailscale up --auth-key=test-persistent-key --ssh": { exitCode: 1 } })
        );

        const error = await tailscalePersistent
            .install({ config, logger: fakeLogger() })
            .catch((err: unknown) => err);

        expect(error).toMatchObject({
            name: "ActivationError",
            message: "tailscale up (persistent) failed.",
            context: { exitCode: 1 },
        });
    });

    it("should raise ActivationError when no key is configured", async () => {
        mockExeca.mockImplementation(freshHost());
        const noKeys: BoxprepConfig = {
            ...config,
            tailscale: { installScriptUrl: config.tailscale.installScriptUrl },
        };

        await expect(
            tailscaleEphemeral.install({ config: noKeys, logger: fakeLogger() })
        ).rejects.toThrow("No auth key configured for ephemeral mode.");
    });
});
