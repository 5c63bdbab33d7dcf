/**
 * Shared types for boxprep
 *
 * Used by both the host package (installers, dispatcher) and the CLI
 * (selection front-ends), kept here to avoid circular dependencies.
 */

/**
 * Every component identifier the installer recognizes, in declaration order
 */
export const COMPONENT_IDS = [
    "inputleap",
    "tailscale-ephemeral",
    "tailscale-persistent",
    "remove-flatpak-inputleap",
] as const;

export type ComponentId = (typeof COMPONENT_IDS)[number];

/**
 * The subset selected by `--all` and the menu's "All" entry.
 * The ephemeral Tailscale mode is deliberately left out.
 */
export const CANONICAL_SUBSET: readonly ComponentId[] = [
    "inputleap",
    "remove-flatpak-inputleap",
    "tailscale-persistent",
];

export function isComponentId(value: string): value is ComponentId {
    return (COMPONENT_IDS as readonly string[]).includes(value);
}

/**
 * Ordered list of components chosen for the current run
 */
export type Selection = ComponentId[];

export type OutcomeStatus =
    | "installed"
    | "already-installed"
    | "removed"
    | "not-present"
    | "skipped"
    | "failed";

/**
 * Result of running one component's installer
 */
export interface ComponentOutcome {
    id: ComponentId;
    status: OutcomeStatus;
    message: string;
}

/**
 * How a non-Debian host is treated
 */
export type PlatformMode = "lenient" | "strict";

/**
 * Validated run configuration
 */
export interface BoxprepConfig {
    inputLeap: {
        /** Release version, e.g. "3.0.2" */
        version: string;
        /** Fully expanded .deb download URL */
        debUrl: string;
    };
    tailscale: {
        /** Vendor install script, piped to sh */
        installScriptUrl: string;
        authKeyEphemeral?: string;
        authKeyPersistent?: string;
    };
    platformMode: PlatformMode;
}

/**
 * Config keys that hold secrets a component may require
 */
export type SecretKey = "authKeyEphemeral" | "authKeyPersistent";
