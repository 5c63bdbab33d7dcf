/**
 * Component registry
 *
 * The fixed set of installable units, keyed by identifier.
 */

import { COMPONENT_IDS } from "@boxprep/shared";
import { inputLeap } from "./inputleap.js";
import { removeFlatpak } from "./flatpak.js";
import { tailscaleEphemeral, tailscalePersistent } from "./tailscale.js";
import type { Component, ComponentRegistry } from "./types.js";

export type { Component, ComponentRegistry, ComponentResult, InstallContext } from "./types.js";
export { installInputLeap, scratchPathFor } from "./inputleap.js";
export { removeFlatpakInputLeap, FLATPAK_APP_ID } from "./flatpak.js";
export { bringUpTailscale, ensureTailscale, upArgs, TAILSCALED_UNIT, type TailscaleMode } from "./tailscale.js";

export const COMPONENT_REGISTRY: ComponentRegistry = {
    inputleap: inputLeap,
    "tailscale-ephemeral": tailscaleEphemeral,
    "tailscale-persistent": tailscalePersistent,
    "remove-flatpak-inputleap": removeFlatpak,
};

/**
 * All components in declaration order
 */
export function listComponents(registry: ComponentRegistry = COMPONENT_REGISTRY): Component[] {
    return COMPONENT_IDS.map((id) => registry[id]);
}
