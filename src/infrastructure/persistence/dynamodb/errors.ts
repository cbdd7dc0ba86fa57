import {
    ConditionFailedError,
    DataAccessError,
    OperationCancelledError,
    StoreError,
    ThrottledError,
} from '../../../domain/exceptions/DataAccessError';
import { StoreCallOutcome } from '../../monitoring/metrics';

const THROTTLING_ERROR_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
]);

export function errorName(error: unknown): string | undefined {
    return error instanceof Error ? error.name : undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isConditionalCheckFailed(error: unknown): boolean {
    return errorName(error) === 'ConditionalCheckFailedException';
}

export function isThrottlingError(error: unknown): boolean {
    const name = errorName(error);
    return name !== undefined && THROTTLING_ERROR_NAMES.has(name);
}

export function isResourceNotFound(error: unknown): boolean {
    return errorName(error) === 'ResourceNotFoundException';
}

export function isResourceInUse(error: unknown): boolean {
    return errorName(error) === 'ResourceInUseException';
}

export function isAbortError(error: unknown): boolean {
    return errorName(error) === 'AbortError' || error instanceof OperationCancelledError;
}

export function classifyOutcome(error: unknown): StoreCallOutcome {
    if (isConditionalCheckFailed(error)) return 'condition_failed';
    if (isThrottlingError(error)) return 'throttled';
    return 'error';
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
    if (signal?.aborted) {
        throw new OperationCancelledError(operation, signal.reason);
    }
}

/**
 * Translates an AWS SDK exception into the data-access error taxonomy.
 * Errors that already belong to it pass through unchanged.
 */
export function mapStoreError(
    error: unknown,
    tableName: string,
    operation: string,
    conditionExpression?: string,
): DataAccessError {
    if (error instanceof DataAccessError) {
        return error;
    }
    if (isConditionalCheckFailed(error)) {
        return new ConditionFailedError(tableName, operation, conditionExpression, error);
    }
    if (isThrottlingError(error)) {
        return new ThrottledError(tableName, operation, error);
    }
    if (isAbortError(error)) {
        return new OperationCancelledError(operation, error);
    }
    return new StoreError(tableName, operation, errorMessage(error), error);
}
