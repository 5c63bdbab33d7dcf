/**
 * Unit tests for direct-list selection
 */

import { describe, it, expect } from "vitest";
import { canonicalSelection, parseAppList } from "../../src/selection/direct.js";
import { fakeLogger } from "../../../host/tests/fake-shell.js";

describe("parseAppList()", () => {
    it("should keep list order", () => {
        expect(parseAppList("tailscale-persistent  inputleap", fakeLogger())).toEqual([
            "tailscale-persistent",
            "inputleap",
        ]);
    });

    it("should warn once per unknown identifier and skip it", () => {
        const logger = fakeLogger();

        const selection = parseAppList("inputleap bogus-item other", logger);

        expect(selection).toEqual(["inputleap"]);
        expect(logger.warn.mock.calls).toEqual([["Unknown app: bogus-item"], ["Unknown app: other"]]);
    });

    it("should return nothing for a blank list", () => {
        expect(parseAppList("   ", fakeLogger())).toEqual([]);
    });
});

describe("canonicalSelection()", () => {
    it("should select the canonical subset without the ephemeral node", () => {
        expect(canonicalSelection()).toEqual([
            "inputleap",
            "remove-flatpak-inputleap",
            "tailscale-persistent",
        ]);
    });
});
