import { batchUnprocessedItemsCounter, dynamoOperationCounter, dynamoOperationDuration } from '../../monitoring/metrics';
import { classifyOutcome } from './errors';

/**
 * Runs one DynamoDB request and records its outcome and latency.
 * Errors are rethrown untouched; callers map them for their own operation.
 */
export async function executeStoreCommand<R>(
    operation: string,
    tableName: string,
    command: () => Promise<R>,
): Promise<R> {
    const endTimer = dynamoOperationDuration.startTimer({ operation, table: tableName });
    try {
        const result = await command();
        dynamoOperationCounter.inc({ operation, table: tableName, outcome: 'success' });
        return result;
    } catch (error) {
        dynamoOperationCounter.inc({ operation, table: tableName, outcome: classifyOutcome(error) });
        throw error;
    } finally {
        endTimer();
    }
}

export function recordUnprocessedItems(tableName: string, count: number): void {
    if (count > 0) {
        batchUnprocessedItemsCounter.inc({ table: tableName }, count);
    }
}
