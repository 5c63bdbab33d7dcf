/**
 * Run configuration
 *
 * Read once from the environment at startup and validated before any
 * component runs. Secrets are optional here; which of them are required
 * depends on the selection (see requireSecrets).
 */

import { z } from "zod";
import { ConfigError, type BoxprepConfig, type SecretKey } from "@boxprep/shared";
import { DEFAULTS, ENV, SECRET_ENV, type ConfigOverrides } from "./types.js";

export { DEFAULTS, ENV, SECRET_ENV, type ConfigOverrides } from "./types.js";

/** A variable set to an empty string counts as unset */
function blankToUndefined(value: unknown): unknown {
    return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function isHttpUrl(value: string): boolean {
    try {
        return ["http:", "https:"].includes(new URL(value).protocol);
    } catch {
        return false;
    }
}

const HttpUrl = z.string().refine(isHttpUrl, { message: "must be a well-formed http(s) URL" });

const EnvSchema = z.object({
    [ENV.inputLeapVersion]: z.preprocess(
        blankToUndefined,
        z
            .string()
            .regex(/^[0-9A-Za-z._-]+$/, "must contain only letters, digits, '.', '-' or '_'")
            .default(DEFAULTS.inputLeapVersion)
    ),
    [ENV.inputLeapDebUrl]: z.preprocess(
        blankToUndefined,
        z.string().default(DEFAULTS.inputLeapDebUrl)
    ),
    [ENV.tailscaleInstallUrl]: z.preprocess(
        blankToUndefined,
        HttpUrl.default(DEFAULTS.tailscaleInstallUrl)
    ),
    [ENV.platformMode]: z.preprocess(
        blankToUndefined,
        z.enum(["lenient", "strict"]).default(DEFAULTS.platformMode)
    ),
    [SECRET_ENV.authKeyEphemeral]: z.preprocess(blankToUndefined, z.string().optional()),
    [SECRET_ENV.authKeyPersistent]: z.preprocess(blankToUndefined, z.string().optional()),
});

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

/**
 * Substitutes `{version}` in a download URL template
 */
export function expandUrlTemplate(template: string, version: string): string {
    return template.replaceAll("{version}", version);
}

/**
 * Loads and validates configuration from environment variables
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {}
): BoxprepConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    const values = parsed.data;

    const version = values[ENV.inputLeapVersion];
    const debUrl = expandUrlTemplate(values[ENV.inputLeapDebUrl], version);
    const checkedUrl = HttpUrl.safeParse(debUrl);
    if (!checkedUrl.success) {
        throw new ConfigError(
            `Invalid configuration: ${ENV.inputLeapDebUrl}: ${checkedUrl.error.issues[0]?.message ?? "invalid URL"}`
        );
    }

    return {
        inputLeap: { version, debUrl },
        tailscale: {
            installScriptUrl: values[ENV.tailscaleInstallUrl],
            authKeyEphemeral: values[SECRET_ENV.authKeyEphemeral],
            authKeyPersistent: values[SECRET_ENV.authKeyPersistent],
        },
        platformMode: overrides.platformMode ?? values[ENV.platformMode],
    };
}

export interface SecretRequirement {
    /** Who needs the secret, for the error message */
    requiredBy: string;
    secrets: readonly SecretKey[];
}

/**
 * Fails fast when a selected component needs a secret that was not supplied
 */
export function requireSecrets(
    config: BoxprepConfig,
    requirements: readonly SecretRequirement[]
): void {
    const missing: string[] = [];

    for (const { requiredBy, secrets } of requirements) {
        for (const key of secrets) {
            if (!config.tailscale[key]) {
                missing.push(`${SECRET_ENV[key]} (needed by ${requiredBy})`);
            }
        }
    }

    if (missing.length > 0) {
        throw new ConfigError(`Missing required configuration: ${missing.join(", ")}`, {
            missing,
        });
    }
}
