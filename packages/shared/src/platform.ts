/**
 * Platform Detection Utilities
 *
 * Identifies the host operating system and distribution family.
 * boxprep only installs onto Debian-family Linux (Debian, Ubuntu, KDE Neon, Mint, ...).
 */

/**
 * Key/value pairs parsed from /etc/os-release
 */
export type OsRelease = Record<string, string>;

/**
 * Default location of the os-release file
 */
export const OS_RELEASE_PATH = "/etc/os-release";

/**
 * Distribution IDs accepted as Debian-family
 */
const DEBIAN_FAMILY = ["debian", "ubuntu"];

/**
 * Returns true if running on Linux
 */
export function isLinux(): boolean {
    return process.platform === "linux";
}

/**
 * Returns true if the current process has uid 0
 */
export function isRoot(): boolean {
    return isLinux() && typeof process.getuid === "function" && process.getuid() === 0;
}

/**
 * Parses the shell-style assignments of an os-release file.
 *
 * Values may be bare, single- or double-quoted; comments and blank lines are skipped.
 */
export function parseOsRelease(content: string): OsRelease {
    const release: OsRelease = {};

    for (const rawLine of content.split("\n")) {
        const line = rawLine.trim();
        if (!line || line.startsWith("#")) continue;

        const eq = line.indexOf("=");
        if (eq <= 0) continue;

        const key = line.slice(0, eq).trim();
        let value = line.slice(eq + 1).trim();
        const quote = value[0];
        if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
            value = value.slice(1, -1);
        }
        if (quote === '"') {
            value = value.replace(/\\(["\\$`])/g, "$1");
        }
        release[key] = value;
    }

    return release;
}

/**
 * Returns true when ID_LIKE (or ID, when ID_LIKE is absent) names a Debian-family base
 */
export function isDebianFamily(release: OsRelease): boolean {
    const lineage = (release.ID_LIKE ?? release.ID ?? "").toLowerCase();
    return DEBIAN_FAMILY.some((family) => lineage.includes(family));
}

/**
 * Short name for the distribution, for log lines
 */
export function describeDistribution(release: OsRelease): string {
    return release.PRETTY_NAME ?? release.ID ?? "unknown";
}
