/**
 * Thin wrappers around execa for shelling out to host tools.
 *
 * Every call runs with `reject: false`; callers inspect the exit code and
 * raise the error type that fits their step.
 */

import { execa } from "execa";
import { isRoot } from "@boxprep/shared";

export interface ResolvedCommand {
    command: string;
    args: string[];
}

export interface RunOptions {
    /** Prefix with sudo unless already root */
    privileged?: boolean;
    /** Stream stdout/stderr to the terminal instead of capturing them */
    inherit?: boolean;
    /** Written to the child's stdin */
    input?: string;
}

export interface RunResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/**
 * Wraps a command that needs elevated access.
 *
 * If root, returns the command as-is; otherwise prefixes it with `sudo`.
 */
export function asPrivileged(command: string, args: string[]): ResolvedCommand {
    if (isRoot()) {
        return { command, args };
    }
    return { command: "sudo", args: [command, ...args] };
}

export async function run(
    command: string,
    args: string[],
    options: RunOptions = {}
): Promise<RunResult> {
    const resolved = options.privileged ? asPrivileged(command, args) : { command, args };
    const stream = options.inherit ? "inherit" : "pipe";

    const result = await execa(resolved.command, resolved.args, {
        reject: false,
        input: options.input,
        stdout: stream,
        stderr: stream,
    });

    return {
        // A command that could not be spawned has no exit code
        exitCode: result.exitCode ?? 1,
        stdout: typeof result.stdout === "string" ? result.stdout : "",
        stderr: typeof result.stderr === "string" ? result.stderr : "",
    };
}

/**
 * Resolves an executable on PATH, or null when absent
 */
export async function which(cmd: string): Promise<string | null> {
    const { exitCode, stdout } = await run("which", [cmd]);
    const resolved = stdout.trim();
    return exitCode === 0 && resolved ? resolved : null;
}

/**
 * Checks if a command exists on the system
 */
export async function commandExists(cmd: string): Promise<boolean> {
    return (await which(cmd)) !== null;
}

export function firstLine(text: string): string {
    return text.trim().split("\n")[0]?.trim() ?? "";
}
