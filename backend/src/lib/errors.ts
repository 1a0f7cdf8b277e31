export const ErrorCode = {
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    CHECK_CONFIG_ERROR: 'CHECK_CONFIG_ERROR',
    STORAGE_ERROR: 'STORAGE_ERROR',
    ALERT_INTEGRITY_ERROR: 'ALERT_INTEGRITY_ERROR',
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    CONFLICT: 'CONFLICT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppErrorOptions {
    code: ErrorCodeType;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
    retryable?: boolean;
}

export class AppError extends Error {
    public readonly code: ErrorCodeType;
    public readonly statusCode: number;
    public readonly details?: Record<string, unknown>;
    public readonly retryable: boolean;
    public readonly originalCause?: unknown;

    constructor(options: AppErrorOptions) {
        super(options.message);
        this.name = 'AppError';
        this.code = options.code;
        this.statusCode = options.statusCode ?? 500;
        this.details = options.details;
        this.retryable = options.retryable ?? false;
        this.originalCause = options.cause;
    }
}

/** Invalid process configuration, raised once at startup. */
export class ConfigError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({ code: ErrorCode.CONFIGURATION_ERROR, message, details });
        this.name = 'ConfigError';
    }
}

/**
 * A (host, check) pair that cannot be evaluated: unknown check kind or
 * parameters that fail validation. The pair is skipped for the sweep.
 */
export class CheckConfigError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({ code: ErrorCode.CHECK_CONFIG_ERROR, message, details });
        this.name = 'CheckConfigError';
    }
}

/** Transient storage failure. The next sweep retries the work. */
export class StorageError extends AppError {
    constructor(operation: string, cause?: unknown) {
        super({
            code: ErrorCode.STORAGE_ERROR,
            message: `Storage operation '${operation}' failed: ${describeError(cause)}`,
            details: { operation },
            cause,
            retryable: true,
        });
        this.name = 'StorageError';
    }
}

/** A second active alert for the same (host, check) pair. */
export class AlertIntegrityError extends AppError {
    constructor(hostId: string, checkKey: string, cause?: unknown) {
        super({
            code: ErrorCode.ALERT_INTEGRITY_ERROR,
            message: `Active alert already exists for host '${hostId}' check '${checkKey}'`,
            details: { host_id: hostId, check_key: checkKey },
            cause,
        });
        this.name = 'AlertIntegrityError';
    }
}

export class ValidationError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({ code: ErrorCode.VALIDATION_ERROR, message, statusCode: 400, details });
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super({ code: ErrorCode.NOT_FOUND, message, statusCode: 404 });
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super({ code: ErrorCode.CONFLICT, message, statusCode: 409 });
        this.name = 'ConflictError';
    }
}

export const describeError = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};

// MongoServerError E11000
export const isDuplicateKeyError = (error: unknown): boolean => {
    if (!error || typeof error !== 'object') return false;
    return 'code' in error && error.code === 11000;
};

export const toHttpError = (error: unknown, fallbackMessage: string) => {
    if (error instanceof AppError) {
        return { status: error.statusCode, body: { message: error.message, code: error.code } };
    }
    return { status: 500, body: { message: fallbackMessage } };
};
