/**
 * Direct-list selection (`--apps` / `--all`)
 */

import {
    CANONICAL_SUBSET,
    isComponentId,
    logger as defaultLogger,
    type Logger,
    type Selection,
} from "@boxprep/shared";

/**
 * Parses a space-separated identifier list, keeping list order.
 * Each unknown identifier is warned about once and skipped.
 */
export function parseAppList(list: string, logger: Logger = defaultLogger): Selection {
    const selection: Selection = [];

    for (const item of list.split(/\s+/).filter(Boolean)) {
        if (isComponentId(item)) {
            selection.push(item);
        } else {
            logger.warn(`Unknown app: ${item}`);
        }
    }

    return selection;
}

export function canonicalSelection(): Selection {
    return [...CANONICAL_SUBSET];
}
