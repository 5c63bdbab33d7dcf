/**
 * Numbered-menu selection
 *
 * Reads one choice per line and yields a Selection for each valid choice, so
 * the caller can dispatch it before the next line is read. Ends on "Quit" or
 * end of input.
 */

import { CANONICAL_SUBSET, logger as defaultLogger, type Logger, type Selection } from "@boxprep/shared";
import type { Component } from "@boxprep/host";

export interface MenuEntry {
    label: string;
    /** Components to install, or "quit" */
    action: Selection | "quit";
}

export function buildMenu(components: readonly Component[]): MenuEntry[] {
    return [
        ...components.map((component) => ({ label: component.label, action: [component.id] })),
        { label: "All", action: [...CANONICAL_SUBSET] },
        { label: "Quit", action: "quit" as const },
    ];
}

export function renderMenu(menu: readonly MenuEntry[]): string {
    const lines = menu.map((entry, index) => `${index + 1}) ${entry.label}`);
    return ["", "Choose what to install:", ...lines].join("\n");
}

export interface NumberedMenuOptions {
    logger?: Logger;
    /** Writes the menu and the prompt */
    write?: (text: string) => void;
}

export async function* numberedMenu(
    lines: AsyncIterable<string>,
    components: readonly Component[],
    options: NumberedMenuOptions = {}
): AsyncGenerator<Selection> {
    const logger = options.logger ?? defaultLogger;
    const write = options.write ?? ((text: string) => process.stdout.write(text));
    const menu = buildMenu(components);

    write(`${renderMenu(menu)}\n#? `);

    for await (const rawLine of lines) {
        const line = rawLine.trim();

        if (line === "") {
            write(`${renderMenu(menu)}\n#? `);
            continue;
        }

        const entry = /^\d+$/.test(line) ? menu[Number(line) - 1] : undefined;
        if (!entry) {
            logger.warn("Invalid choice");
        } else if (entry.action === "quit") {
            return;
        } else {
            yield [...entry.action];
        }

        write("#? ");
    }
}
