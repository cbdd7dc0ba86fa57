import { DynamoDBClient, ScanCommand, ScanCommandInput, ScanCommandOutput } from '@aws-sdk/client-dynamodb';
import { ILogger } from '../../../../application/interfaces/ILogger';
import { Key, PageResult, PaginatedScanOptions, ScanOptions } from '../../../../shared/types/query.types';
import { throwIfAborted } from '../errors';
import { executeStoreCommand } from '../execute';
import { IEntityCodec } from './EntityCodec';
import { mergeAttributeMaps } from './expressions';
import { decodeItems, presentKey, toQueryFailure } from './QueryEngine';

/**
 * Full-table reads. Cost grows with the table, not with the number of matches.
 */
export class ScanEngine<T> {
    constructor(
        private readonly client: DynamoDBClient,
        private readonly tableName: string,
        private readonly codec: IEntityCodec<T>,
        private readonly logger: ILogger,
    ) { }

    /**
     * Follows the store's page cursor until it is exhausted and returns every
     * item in arrival order.
     */
    async scanAll(options: ScanOptions = {}, signal?: AbortSignal): Promise<T[]> {
        return this.scanAllAs(this.codec, options, signal);
    }

    /** Like `scanAll`, decoding each item with `decoder`; used for projected reads. */
    async scanAllAs<P>(decoder: IEntityCodec<P>, options: ScanOptions = {}, signal?: AbortSignal): Promise<P[]> {
        const items: P[] = [];
        let startKey: Key | undefined;
        let pages = 0;

        do {
            throwIfAborted(signal, 'Scan');
            const output = await this.send(this.buildInput(options, options.limit, startKey));
            items.push(...decodeItems(output, decoder));
            startKey = presentKey(output.LastEvaluatedKey);
            pages++;
        } while (startKey);

        this.logger.debug(`Scanned ${this.tableName}`, { pages, items: items.length });
        return items;
    }

    async scanPage(options: PaginatedScanOptions = {}, signal?: AbortSignal): Promise<PageResult<T>> {
        return this.scanPageAs(this.codec, options, signal);
    }

    async scanPageAs<P>(decoder: IEntityCodec<P>, options: PaginatedScanOptions = {}, signal?: AbortSignal): Promise<PageResult<P>> {
        throwIfAborted(signal, 'Scan');
        const output = await this.send(this.buildInput(options, options.pageSize, options.exclusiveStartKey));
        const lastEvaluatedKey = presentKey(output.LastEvaluatedKey);
        return {
            items: decodeItems(output, decoder),
            hasMore: lastEvaluatedKey !== undefined,
            ...(lastEvaluatedKey ? { lastEvaluatedKey } : {}),
        };
    }

    private buildInput(options: Omit<ScanOptions, 'limit'>, limit?: number, exclusiveStartKey?: Key): ScanCommandInput {
        const values = options.expressionAttributeValues ? this.codec.marshalValues(options.expressionAttributeValues) : undefined;
        const names = mergeAttributeMaps(options.expressionAttributeNames);
        return {
            TableName: this.tableName,
            ...(options.indexName ? { IndexName: options.indexName } : {}),
            ...(options.filterExpression ? { FilterExpression: options.filterExpression } : {}),
            ...(options.projectionExpression ? { ProjectionExpression: options.projectionExpression } : {}),
            ...(names ? { ExpressionAttributeNames: names } : {}),
            ...(values && Object.keys(values).length > 0 ? { ExpressionAttributeValues: values } : {}),
            ...(limit !== undefined ? { Limit: limit } : {}),
            ...(options.consistentRead === true ? { ConsistentRead: true } : {}),
            ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
        };
    }

    private async send(input: ScanCommandInput): Promise<ScanCommandOutput> {
        try {
            return await executeStoreCommand('Scan', this.tableName, () => this.client.send(new ScanCommand(input)));
        } catch (error) {
            this.logger.error(`Scan on ${this.tableName} failed`, error, { filterExpression: input.FilterExpression });
            throw toQueryFailure(error, this.tableName, 'Scan');
        }
    }
}
