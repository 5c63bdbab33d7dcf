/**
 * Unit tests for the checklist selection
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockCheckbox } = vi.hoisted(() => ({
    mockCheckbox: vi.fn(),
}));

vi.mock("@inquirer/prompts", () => ({
    checkbox: mockCheckbox,
}));

import { listComponents } from "@boxprep/host";
import { checklistSelection } from "../../src/selection/checklist.js";
import { fakeLogger } from "../../../host/tests/fake-shell.js";

class ExitPromptError extends Error {
    override name = "ExitPromptError";
}

describe("checklistSelection()", () => {
    beforeEach(() => {
        mockCheckbox.mockReset();
    });

    it("should pre-check the default components", async () => {
        mockCheckbox.mockResolvedValue([]);

        await checklistSelection(listComponents(), fakeLogger());

        const [{ choices }] = mockCheckbox.mock.calls[0] ?? [{ choices: [] }];
        expect(choices).toEqual([
            expect.objectContaining({ value: "inputleap", checked: true }),
            expect.objectContaining({ value: "tailscale-ephemeral", checked: false }),
            expect.objectContaining({ value: "tailscale-persistent", checked: true }),
            expect.objectContaining({ value: "remove-flatpak-inputleap", checked: true }),
        ]);
    });

    it("should return the checked components in declaration order", async () => {
        mockCheckbox.mockResolvedValue(["remove-flatpak-inputleap", "inputleap"]);

        expect(await checklistSelection(listComponents(), fakeLogger())).toEqual([
            "inputleap",
            "remove-flatpak-inputleap",
        ]);
    });

    it("should select nothing when the prompt is cancelled", async () => {
        const logger = fakeLogger();
        mockCheckbox.mockRejectedValue(new ExitPromptError("User force closed the prompt"));

        expect(await checklistSelection(listComponents(), logger)).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith("Menu cancelled.");
    });

    it("should rethrow other prompt errors", async () => {
        mockCheckbox.mockRejectedValue(new Error("terminal went away"));

        await expect(checklistSelection(listComponents(), fakeLogger())).rejects.toThrow(
            "terminal went away"
        );
    });
});
