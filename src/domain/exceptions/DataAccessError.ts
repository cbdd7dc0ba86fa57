import { BaseError } from '../../shared/errors/BaseError';

export const DATA_ACCESS_ERROR_CODES = {
    ENCODING_ERROR: 'ENCODING_ERROR',
    DECODING_ERROR: 'DECODING_ERROR',
    CONDITION_FAILED: 'CONDITION_FAILED',
    THROTTLED: 'THROTTLED',
    PARTIAL_BATCH_FAILURE: 'PARTIAL_BATCH_FAILURE',
    TABLE_UNAVAILABLE: 'TABLE_UNAVAILABLE',
    QUERY_ERROR: 'QUERY_ERROR',
    OPERATION_CANCELLED: 'OPERATION_CANCELLED',
    STORE_ERROR: 'STORE_ERROR',
} as const;

export type DataAccessErrorCode = typeof DATA_ACCESS_ERROR_CODES[keyof typeof DATA_ACCESS_ERROR_CODES];

/**
 * Base class for every failure surfaced by the data-access engine.
 * A missing item is never an error: single-item reads resolve to `null`.
 */
export class DataAccessError extends BaseError {
    public declare readonly code: DataAccessErrorCode;

    constructor(name: string, code: DataAccessErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
        super(name, code, message, true, details, cause);
    }
}

/** An entity or value has no attribute-value representation. */
export class EncodingError extends DataAccessError {
    constructor(message: string, cause?: unknown) {
        super('EncodingError', DATA_ACCESS_ERROR_CODES.ENCODING_ERROR, message, undefined, cause);
    }
}

/**
 * A stored item does not match the shape the entity expects.
 * `issues` carries one entry per failing path when schema validation produced them.
 */
export class DecodingError extends DataAccessError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = [], cause?: unknown) {
        super('DecodingError', DATA_ACCESS_ERROR_CODES.DECODING_ERROR, message, { issues }, cause);
        this.issues = issues;
    }
}

/**
 * A conditional put, delete or update was rejected by the store.
 * Covers duplicate keys on save-if-not-exists and optimistic-lock version conflicts alike.
 */
export class ConditionFailedError extends DataAccessError {
    constructor(tableName: string, operation: string, conditionExpression?: string, cause?: unknown) {
        super(
            'ConditionFailedError',
            DATA_ACCESS_ERROR_CODES.CONDITION_FAILED,
            `Condition check failed for ${operation} on table '${tableName}'.`,
            { tableName, operation, conditionExpression },
            cause,
        );
    }
}

export class ThrottledError extends DataAccessError {
    constructor(tableName: string, operation: string, cause?: unknown) {
        super(
            'ThrottledError',
            DATA_ACCESS_ERROR_CODES.THROTTLED,
            `Request throttled for ${operation} on table '${tableName}'.`,
            { tableName, operation },
            cause,
        );
    }
}

export class PartialBatchFailureError extends DataAccessError {
    public readonly writtenCount: number;
    public readonly remainingCount: number;
    public readonly rejectedCount: number;
    public readonly causes: Error[];

    /**
     * @param remainingCount - items still unprocessed once the attempt budget ran out, or whose chunk the store rejected
     * @param rejectedCount - items that never reached the store because they could not be encoded
     */
    constructor(tableName: string, writtenCount: number, remainingCount: number, rejectedCount: number, causes: Error[] = []) {
        super(
            'PartialBatchFailureError',
            DATA_ACCESS_ERROR_CODES.PARTIAL_BATCH_FAILURE,
            `Batch write to table '${tableName}' incomplete: ${writtenCount} written, ${remainingCount} unprocessed, ${rejectedCount} rejected.`,
            { tableName, writtenCount, remainingCount, rejectedCount },
        );
        this.writtenCount = writtenCount;
        this.remainingCount = remainingCount;
        this.rejectedCount = rejectedCount;
        this.causes = causes;
    }
}

export class TableUnavailableError extends DataAccessError {
    constructor(tableName: string, reason: string, cause?: unknown) {
        super(
            'TableUnavailableError',
            DATA_ACCESS_ERROR_CODES.TABLE_UNAVAILABLE,
            `Table '${tableName}' is unavailable: ${reason}`,
            { tableName },
            cause,
        );
    }
}

export class QueryError extends DataAccessError {
    constructor(tableName: string, operation: 'Query' | 'Scan', reason: string, cause?: unknown) {
        super(
            'QueryError',
            DATA_ACCESS_ERROR_CODES.QUERY_ERROR,
            `${operation} on table '${tableName}' was rejected: ${reason}`,
            { tableName, operation },
            cause,
        );
    }
}

export class OperationCancelledError extends DataAccessError {
    constructor(operation: string, cause?: unknown) {
        super(
            'OperationCancelledError',
            DATA_ACCESS_ERROR_CODES.OPERATION_CANCELLED,
            `${operation} was cancelled.`,
            { operation },
            cause,
        );
    }
}

export class StoreError extends DataAccessError {
    constructor(tableName: string, operation: string, reason: string, cause?: unknown) {
        super(
            'StoreError',
            DATA_ACCESS_ERROR_CODES.STORE_ERROR,
            `Failed to ${operation} on table '${tableName}': ${reason}`,
            { tableName, operation },
            cause,
        );
    }
}
