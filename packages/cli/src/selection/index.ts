export { parseAppList, canonicalSelection } from "./direct.js";
export { checklistSelection } from "./checklist.js";
export { numberedMenu, buildMenu, renderMenu, type MenuEntry } from "./numbered.js";

export const MENU_STRATEGIES = ["checklist", "numbered"] as const;

export type MenuStrategy = (typeof MENU_STRATEGIES)[number];

export function isMenuStrategy(value: string): value is MenuStrategy {
    return (MENU_STRATEGIES as readonly string[]).includes(value);
}
