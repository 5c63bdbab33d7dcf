/**
 * Unknown-option detection
 *
 * yargs runs non-strict so that unrecognized flags only warn. This scans the
 * raw arguments for anything it does not recognize. Negated and camelCase
 * spellings are turned off in the parser, so they are reported here too.
 */

const KNOWN_FLAGS = new Set([
    "--all",
    "--apps",
    "--menu",
    "--strict-platform",
    "-h",
    "--help",
    "-v",
    "--version",
]);

/** Flags that consume the next argument as their value */
const VALUE_FLAGS = new Set(["--apps", "--menu"]);

export function findUnknownOptions(rawArgs: readonly string[]): string[] {
    const unknown: string[] = [];

    for (let i = 0; i < rawArgs.length; i++) {
        const arg = rawArgs[i] ?? "";
        const [flag = "", inlineValue] = arg.split("=", 2);

        if (KNOWN_FLAGS.has(flag)) {
            if (VALUE_FLAGS.has(flag) && inlineValue === undefined) {
                i++;
            }
            continue;
        }
        unknown.push(arg);
    }

    return unknown;
}
