/**
 * Stable error codes surfaced by sessiondb core, repositories and adapters.
 */
export type ErrorCode =
    | "INVALID_SESSION_ID"
    | "INVALID_CONFIGURATION"
    | "SERIALIZATION_FAILED"
    | "INVALID_ROW";

/**
 * Canonical error type used across sessiondb packages.
 *
 * Storage failures are never wrapped in it: whatever the driver throws reaches
 * the caller as is.
 */
export class SessionDbError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionDbError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract used for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SessionDbError}.
 */
export function isSessionDbError(error: unknown): error is SessionDbError {
    return error instanceof SessionDbError;
}

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): number {
    switch (code) {
        case "INVALID_SESSION_ID":
            return 400;
        case "INVALID_CONFIGURATION":
        case "SERIALIZATION_FAILED":
        case "INVALID_ROW":
        default:
            return 500;
    }
}

export function invalidConfiguration(message: string, details?: Record<string, unknown>): SessionDbError {
    return new SessionDbError("INVALID_CONFIGURATION", message, undefined, details);
}
