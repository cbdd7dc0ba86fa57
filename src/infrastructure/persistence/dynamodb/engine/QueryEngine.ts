import { DynamoDBClient, QueryCommand, QueryCommandInput, QueryCommandOutput } from '@aws-sdk/client-dynamodb';
import { ILogger } from '../../../../application/interfaces/ILogger';
import { DataAccessError, QueryError } from '../../../../domain/exceptions/DataAccessError';
import { APP_CONSTANTS } from '../../../../shared/constants';
import { AttributeMap, Key, PageResult, PaginatedQueryOptions, QueryOptions } from '../../../../shared/types/query.types';
import { errorMessage, isAbortError, isThrottlingError, mapStoreError, throwIfAborted } from '../errors';
import { executeStoreCommand } from '../execute';
import { IEntityCodec } from './EntityCodec';
import { buildProjection, mergeAttributeMaps } from './expressions';

export class QueryEngine<T> {
    constructor(
        private readonly client: DynamoDBClient,
        private readonly tableName: string,
        private readonly codec: IEntityCodec<T>,
        private readonly logger: ILogger,
    ) { }

    /**
     * Runs a single Query request. `limit` caps the items the store evaluates,
     * so fewer matches may come back than exist.
     */
    async query(options: QueryOptions, signal?: AbortSignal): Promise<T[]> {
        return this.queryAs(this.codec, options, signal);
    }

    /** Like `query`, decoding each item with `decoder`; used for projected reads. */
    async queryAs<P>(decoder: IEntityCodec<P>, options: QueryOptions, signal?: AbortSignal): Promise<P[]> {
        throwIfAborted(signal, 'Query');
        const output = await this.send(this.buildInput(options, options.limit));
        return decodeItems(output, decoder);
    }

    async queryPage(options: PaginatedQueryOptions, signal?: AbortSignal): Promise<PageResult<T>> {
        return this.queryPageAs(this.codec, options, signal);
    }

    async queryPageAs<P>(decoder: IEntityCodec<P>, options: PaginatedQueryOptions, signal?: AbortSignal): Promise<PageResult<P>> {
        throwIfAborted(signal, 'Query');
        const output = await this.send(this.buildInput(options, options.pageSize, options.exclusiveStartKey));
        const lastEvaluatedKey = presentKey(output.LastEvaluatedKey);
        return {
            items: decodeItems(output, decoder),
            hasMore: lastEvaluatedKey !== undefined,
            ...(lastEvaluatedKey ? { lastEvaluatedKey } : {}),
        };
    }

    /**
     * Counts matching items across every page, reading back only the partition key.
     */
    async count(options: QueryOptions, signal?: AbortSignal): Promise<number> {
        const projection = buildProjection([APP_CONSTANTS.PARTITION_KEY]);
        const countOptions: QueryOptions = {
            ...options,
            limit: undefined,
            projectionExpression: projection.projectionExpression,
            expressionAttributeNames: { ...options.expressionAttributeNames, ...projection.expressionAttributeNames },
        };

        let total = 0;
        let startKey: Key | undefined;
        do {
            throwIfAborted(signal, 'Query');
            const output = await this.send(this.buildInput(countOptions, undefined, startKey));
            total += output.Items?.length ?? 0;
            startKey = presentKey(output.LastEvaluatedKey);
        } while (startKey);

        return total;
    }

    private buildInput(options: Omit<QueryOptions, 'limit'>, limit?: number, exclusiveStartKey?: Key): QueryCommandInput {
        const values = options.expressionAttributeValues ? this.codec.marshalValues(options.expressionAttributeValues) : undefined;
        const names = mergeAttributeMaps(options.expressionAttributeNames);
        return {
            TableName: this.tableName,
            ...(options.indexName ? { IndexName: options.indexName } : {}),
            ...(options.keyConditionExpression ? { KeyConditionExpression: options.keyConditionExpression } : {}),
            ...(options.filterExpression ? { FilterExpression: options.filterExpression } : {}),
            ...(options.projectionExpression ? { ProjectionExpression: options.projectionExpression } : {}),
            ...(names ? { ExpressionAttributeNames: names } : {}),
            ...(values && Object.keys(values).length > 0 ? { ExpressionAttributeValues: values } : {}),
            ...(options.scanIndexForward === false ? { ScanIndexForward: false } : {}),
            ...(limit !== undefined ? { Limit: limit } : {}),
            ...(options.consistentRead === true ? { ConsistentRead: true } : {}),
            ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
        };
    }

    private async send(input: QueryCommandInput): Promise<QueryCommandOutput> {
        try {
            return await executeStoreCommand('Query', this.tableName, () => this.client.send(new QueryCommand(input)));
        } catch (error) {
            this.logger.error(`Query on ${this.tableName} failed`, error, {
                indexName: input.IndexName,
                keyConditionExpression: input.KeyConditionExpression,
            });
            throw toQueryFailure(error, this.tableName, 'Query');
        }
    }
}

/**
 * Throttling and cancellation keep their own types; every other rejection of a
 * Query or Scan request becomes a QueryError.
 */
export function toQueryFailure(error: unknown, tableName: string, operation: 'Query' | 'Scan'): DataAccessError {
    if (error instanceof DataAccessError || isThrottlingError(error) || isAbortError(error)) {
        return mapStoreError(error, tableName, operation);
    }
    return new QueryError(tableName, operation, errorMessage(error), error);
}

export function decodeItems<P>(output: { Items?: AttributeMap[] }, decoder: IEntityCodec<P>): P[] {
    return (output.Items ?? []).map(item => decoder.unmarshal(item));
}

export function presentKey(key: Key | undefined): Key | undefined {
    return key && Object.keys(key).length > 0 ? key : undefined;
}
