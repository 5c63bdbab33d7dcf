export enum BoxprepErrorCode {
    PERMISSION_DENIED = "PERMISSION_DENIED",
    UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
    PREREQUISITE_FAILED = "PREREQUISITE_FAILED",
    INVALID_CONFIG = "INVALID_CONFIG",
    FETCH_FAILED = "FETCH_FAILED",
    INSTALL_FAILED = "INSTALL_FAILED",
    ACTIVATION_FAILED = "ACTIVATION_FAILED",
}

export class BoxprepError extends Error {
    readonly code: BoxprepErrorCode;
    readonly context?: Record<string, unknown>;

    constructor(code: BoxprepErrorCode, message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = "BoxprepError";
        this.code = code;
        this.context = context;
    }
}

export class PermissionDeniedError extends BoxprepError {
    constructor(message = "sudo permission required.", context?: Record<string, unknown>) {
        super(BoxprepErrorCode.PERMISSION_DENIED, message, context);
        this.name = "PermissionDeniedError";
    }
}

export class UnsupportedPlatformError extends BoxprepError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(BoxprepErrorCode.UNSUPPORTED_PLATFORM, message, context);
        this.name = "UnsupportedPlatformError";
    }
}

export class PrerequisiteError extends BoxprepError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(BoxprepErrorCode.PREREQUISITE_FAILED, message, context);
        this.name = "PrerequisiteError";
    }
}

export class ConfigError extends BoxprepError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(BoxprepErrorCode.INVALID_CONFIG, message, context);
        this.name = "ConfigError";
    }
}

export class FetchError extends BoxprepError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(BoxprepErrorCode.FETCH_FAILED, message, context);
        this.name = "FetchError";
    }
}

export class InstallError extends BoxprepError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(BoxprepErrorCode.INSTALL_FAILED, message, context);
        this.name = "InstallError";
    }
}

export class ActivationError extends BoxprepError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(BoxprepErrorCode.ACTIVATION_FAILED, message, context);
        this.name = "ActivationError";
    }
}

const FATAL_CODES = new Set<BoxprepErrorCode>([
    BoxprepErrorCode.PERMISSION_DENIED,
    BoxprepErrorCode.UNSUPPORTED_PLATFORM,
    BoxprepErrorCode.PREREQUISITE_FAILED,
    BoxprepErrorCode.INVALID_CONFIG,
]);

/**
 * Fatal errors abort the whole run; everything else is isolated to one component
 */
export function isFatal(error: unknown): boolean {
    return error instanceof BoxprepError && FATAL_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
