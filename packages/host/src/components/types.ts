import type {
    BoxprepConfig,
    ComponentId,
    Logger,
    OutcomeStatus,
    SecretKey,
} from "@boxprep/shared";

/**
 * Everything an installer needs for one run
 */
export interface InstallContext {
    config: BoxprepConfig;
    logger: Logger;
}

/**
 * What a successful installer call reports. Failures are thrown.
 */
export interface ComponentResult {
    status: Exclude<OutcomeStatus, "failed">;
    message: string;
}

/**
 * One selectable installable unit
 */
export interface Component {
    id: ComponentId;
    /** Menu and log label */
    label: string;
    /** Shown in the --help component table */
    description: string;
    /** Pre-checked in the interactive checklist */
    defaultSelected: boolean;
    /** Needs sudo (triggers the privilege and platform preflight) */
    requiresRoot: boolean;
    /** Config secrets that must be supplied before this component runs */
    secrets: readonly SecretKey[];
    install(context: InstallContext): Promise<ComponentResult>;
}

export type ComponentRegistry = Readonly<Record<ComponentId, Component>>;
