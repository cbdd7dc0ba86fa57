import { BatchWriteItemCommand, DynamoDBClient, WriteRequest } from '@aws-sdk/client-dynamodb';
import { ILogger } from '../../../../application/interfaces/ILogger';
import { OperationCancelledError, PartialBatchFailureError } from '../../../../domain/exceptions/DataAccessError';
import { BatchWriteResult, Key } from '../../../../shared/types/query.types';
import { Clock } from '../../../../shared/utils/clock';
import { isAbortError, isThrottlingError, mapStoreError, throwIfAborted } from '../errors';
import { executeStoreCommand, recordUnprocessedItems } from '../execute';
import { IEntityCodec } from './EntityCodec';

export interface BatchWriterSettings {
    /** Requests per BatchWriteItem call; the store accepts at most 25. */
    maxBatchSize: number;
    /** Calls per chunk, the first one included. */
    maxAttempts: number;
    baseDelayMs: number;
}

interface ChunkOutcome {
    written: number;
    remaining: number;
    cause?: Error;
}

/**
 * Best-effort bulk puts and deletes. The write set is cut into chunks the store
 * accepts, and each chunk's unprocessed requests are re-sent with quadratic backoff
 * until its attempt budget runs out.
 */
export class BatchWriter<T> {
    constructor(
        private readonly client: DynamoDBClient,
        private readonly tableName: string,
        private readonly codec: IEntityCodec<T>,
        private readonly logger: ILogger,
        private readonly settings: BatchWriterSettings,
        private readonly clock: Clock,
    ) { }

    /**
     * @throws {PartialBatchFailureError} when any item was not written, after every chunk was tried.
     * @throws {OperationCancelledError} when `signal` fires; nothing further is sent.
     */
    async writeAll(items: readonly T[], signal?: AbortSignal): Promise<BatchWriteResult> {
        const requests: WriteRequest[] = [];
        const causes: Error[] = [];
        let rejected = 0;

        for (const item of items) {
            try {
                requests.push({ PutRequest: { Item: this.codec.marshal(item) } });
            } catch (error) {
                rejected++;
                causes.push(mapStoreError(error, this.tableName, 'BatchWriteItem'));
            }
        }
        if (rejected > 0) {
            this.logger.warn(`${rejected} ${this.codec.entityName} item(s) could not be encoded and were left out of the batch`, {
                tableName: this.tableName,
            });
        }

        return this.submit(requests, rejected, causes, signal);
    }

    async deleteAll(keys: readonly Key[], signal?: AbortSignal): Promise<BatchWriteResult> {
        const requests: WriteRequest[] = keys.map(key => ({ DeleteRequest: { Key: key } }));
        return this.submit(requests, 0, [], signal);
    }

    private async submit(requests: WriteRequest[], rejected: number, causes: Error[], signal?: AbortSignal): Promise<BatchWriteResult> {
        let written = 0;
        let remaining = 0;

        for (let start = 0; start < requests.length; start += this.settings.maxBatchSize) {
            const chunk = requests.slice(start, start + this.settings.maxBatchSize);
            const outcome = await this.writeChunk(chunk, signal);
            written += outcome.written;
            remaining += outcome.remaining;
            if (outcome.cause) {
                causes.push(outcome.cause);
            }
        }

        if (remaining > 0 || rejected > 0) {
            const failure = new PartialBatchFailureError(this.tableName, written, remaining, rejected, causes);
            this.logger.error(`Batch write to ${this.tableName} incomplete`, failure, {
                writtenCount: written,
                remainingCount: remaining,
                rejectedCount: rejected,
            });
            throw failure;
        }

        this.logger.debug(`Batch wrote ${written} request(s) to ${this.tableName}`);
        return { writtenCount: written };
    }

    private async writeChunk(chunk: WriteRequest[], signal?: AbortSignal): Promise<ChunkOutcome> {
        let pending = chunk;
        let written = 0;
        let throttled: Error | undefined;

        for (let attempt = 1; attempt <= this.settings.maxAttempts && pending.length > 0; attempt++) {
            if (attempt > 1) {
                await this.backoff(attempt, signal);
            }
            throwIfAborted(signal, 'BatchWriteItem');

            const requestItems = { [this.tableName]: pending };
            try {
                const result = await executeStoreCommand('BatchWriteItem', this.tableName, () =>
                    this.client.send(new BatchWriteItemCommand({ RequestItems: requestItems })),
                );
                const unprocessed = result.UnprocessedItems?.[this.tableName] ?? [];
                written += pending.length - unprocessed.length;
                pending = unprocessed;
                throttled = undefined;
                recordUnprocessedItems(this.tableName, unprocessed.length);
            } catch (error) {
                if (!isThrottlingError(error)) {
                    this.logger.error(`BatchWriteItem on ${this.tableName} rejected`, error, { pending: pending.length });
                    return { written, remaining: pending.length, cause: mapStoreError(error, this.tableName, 'BatchWriteItem') };
                }
                // Throttled call: every pending request stays pending
                throttled = mapStoreError(error, this.tableName, 'BatchWriteItem');
                recordUnprocessedItems(this.tableName, pending.length);
            }

            if (pending.length > 0) {
                this.logger.warn(`BatchWriteItem on ${this.tableName} left ${pending.length} request(s) unprocessed`, { attempt });
            }
        }

        return { written, remaining: pending.length, cause: pending.length > 0 ? throttled : undefined };
    }

    private async backoff(attempt: number, signal?: AbortSignal): Promise<void> {
        const delayMs = (attempt - 1) ** 2 * this.settings.baseDelayMs;
        try {
            await this.clock.sleep(delayMs, signal);
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) {
                throw new OperationCancelledError('BatchWriteItem', error);
            }
            throw error;
        }
    }
}
