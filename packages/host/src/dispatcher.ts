/**
 * Dispatcher
 *
 * Runs the selected installers one at a time, in selection order.
 * A failing component is logged and recorded; the run moves on.
 */

import {
    errorMessage,
    logger as defaultLogger,
    type ComponentOutcome,
    type Logger,
    type Selection,
} from "@boxprep/shared";
import { COMPONENT_REGISTRY } from "./components/index.js";
import type { ComponentRegistry, InstallContext } from "./components/types.js";

export async function dispatch(
    selection: Selection,
    context: InstallContext,
    registry: ComponentRegistry = COMPONENT_REGISTRY
): Promise<ComponentOutcome[]> {
    const outcomes: ComponentOutcome[] = [];

    for (const id of selection) {
        const component = registry[id];
        context.logger.info(`==> ${component.label}`);

        try {
            const result = await component.install(context);
            outcomes.push({ id, ...result });
        } catch (error) {
            const message = errorMessage(error);
            context.logger.error(`${component.label}: ${message}`);
            outcomes.push({ id, status: "failed", message });
        }
    }

    return outcomes;
}

export function hasFailures(outcomes: readonly ComponentOutcome[]): boolean {
    return outcomes.some((outcome) => outcome.status === "failed");
}

/**
 * Prints one line per component with its status marker
 */
export function summarize(
    outcomes: readonly ComponentOutcome[],
    logger: Logger = defaultLogger
): void {
    if (outcomes.length === 0) return;

    logger.info("Summary:");
    for (const { id, status, message } of outcomes) {
        const line = `${id}: ${status} (${message})`;
        switch (status) {
            case "installed":
            case "removed":
                logger.log(line);
                break;
            case "failed":
                logger.error(line);
                break;
            default:
                logger.warn(line);
        }
    }
}
