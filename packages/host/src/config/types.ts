import type { PlatformMode, SecretKey } from "@boxprep/shared";

/**
 * Environment variables that override built-in defaults
 */
export const ENV = {
    inputLeapVersion: "IL_VERSION",
    inputLeapDebUrl: "IL_DEB_URL",
    tailscaleInstallUrl: "TAILSCALE_INSTALL_URL",
    platformMode: "BOXPREP_PLATFORM_MODE",
} as const;

/**
 * Environment variable that supplies each secret. Secrets have no default.
 */
export const SECRET_ENV = {
    authKeyEphemeral: "TS_AUTHKEY_EPHEMERAL",
    authKeyPersistent: "TS_AUTHKEY_PERSISTENT",
} as const satisfies Record<SecretKey, string>;

/**
 * Default configuration values
 */
export const DEFAULTS = {
    inputLeapVersion: "3.0.2",
    /** `{version}` is replaced with the configured version */
    inputLeapDebUrl:
        "https://github.com/input-leap/input-leap/releases/download/v{version}/InputLeap_{version}_debian12_amd64.deb",
    tailscaleInstallUrl: "https://tailscale.com/install.sh",
    platformMode: "lenient",
} as const;

/**
 * Values that take precedence over the environment (CLI flags)
 */
export interface ConfigOverrides {
    platformMode?: PlatformMode;
}
