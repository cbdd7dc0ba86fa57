/**
 * Base class for operational errors raised by the data-access layer.
 * Callers branch on `code`; mapping to any transport-level status is their concern.
 */
export class BaseError extends Error {
    public readonly code: string;
    public readonly isOperational: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(
        name: string,
        code: string,
        message: string,
        isOperational = true,
        details?: Record<string, unknown>,
        cause?: unknown,
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = name;
        this.code = code;
        this.isOperational = isOperational;
        this.details = details;

        if (typeof Error.captureStackTrace === 'function') {
            Error.captureStackTrace(this, this.constructor);
        }
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ValidationError extends BaseError {
    constructor(message = 'Validation Failed', details?: Record<string, unknown>) {
        super('ValidationError', 'VALIDATION_ERROR', message, true, details);
    }
}
