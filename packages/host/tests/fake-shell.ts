/**
 * In-process stand-in for the host shell.
 *
 * Routes each execa call by its full command line. Unrouted commands exit 1,
 * which reads as "not installed" for `which`.
 */

import { vi, type Mock } from "vitest";
import type { Logger } from "@boxprep/shared";

export interface FakeResponse {
    exitCode?: number;
    stdout?: string;
    stderr?: string;
}

export type FakeRoute = FakeResponse | (() => FakeResponse);

export function fakeShell(routes: Record<string, FakeRoute>) {
    return async (command: string, args: readonly string[] = []) => {
        const route = routes[[command, ...args].join(" ")];
        const response = typeof route === "function" ? route() : (route ?? { exitCode: 1 });
        return {
            exitCode: response.exitCode ?? 0,
            stdout: response.stdout ?? "",
            stderr: response.stderr ?? "",
        };
    };
}

/**
 * Command lines the mock was called with, in order
 */
export function commandLines(mock: Mock): string[] {
    return mock.mock.calls.map((call) => [call[0], ...(call[1] ?? [])].join(" "));
}

export function fakeLogger() {
    return {
        log: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        error: vi.fn<(message: string) => void>(),
        info: vi.fn<(message: string) => void>(),
    } satisfies Logger;
}
