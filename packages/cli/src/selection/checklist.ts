/**
 * Checklist selection
 *
 * Presents every component with its default pre-checked and returns the
 * checked ones in declaration order.
 */

import { checkbox } from "@inquirer/prompts";
import { COMPONENT_IDS, logger as defaultLogger, type Logger, type Selection } from "@boxprep/shared";
import type { Component } from "@boxprep/host";

function isPromptExit(error: unknown): boolean {
    return error instanceof Error && error.name === "ExitPromptError";
}

export async function checklistSelection(
    components: readonly Component[],
    logger: Logger = defaultLogger
): Promise<Selection> {
    let chosen: Selection;
    try {
        chosen = await checkbox({
            message: "Select components to install",
            choices: components.map((component) => ({
                name: component.label,
                value: component.id,
                description: component.description,
                checked: component.defaultSelected,
            })),
            pageSize: components.length,
        });
    } catch (error) {
        if (isPromptExit(error)) {
            logger.warn("Menu cancelled.");
            return [];
        }
        throw error;
    }

    return [...chosen].sort((a, b) => COMPONENT_IDS.indexOf(a) - COMPONENT_IDS.indexOf(b));
}
