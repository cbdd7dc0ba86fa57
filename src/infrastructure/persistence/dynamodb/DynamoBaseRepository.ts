import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { ILogger } from '../../../application/interfaces/ILogger';
import { IRepository } from '../../../application/interfaces/IRepository';
import { DynamoEntity } from '../../../domain/entities/DynamoEntity';
import { APP_CONSTANTS } from '../../../shared/constants';
import {
    BatchWriteResult,
    PageResult,
    PaginatedQueryOptions,
    PaginatedScanOptions,
    QueryOptions,
    ScanOptions,
    UpdateOptions,
} from '../../../shared/types/query.types';
import { Clock } from '../../../shared/utils/clock';
import { DataAccessSettings } from '../../config/dataAccessSettings';
import { BatchWriter } from './engine/BatchWriter';
import { CapabilityInjector, UpdateStamps } from './engine/CapabilityInjector';
import { IEntityCodec } from './engine/EntityCodec';
import { mergeAttributeMaps } from './engine/expressions';
import { ItemAccessor, ItemUpdateOptions } from './engine/ItemAccessor';
import { KeyBuilder } from './engine/KeyBuilder';
import { QueryEngine } from './engine/QueryEngine';
import { ScanEngine } from './engine/ScanEngine';

export interface RepositoryDependencies {
    client: DynamoDBClient;
    logger: ILogger;
    settings: DataAccessSettings;
    clock: Clock;
}

/**
 * Repository over a table whose partition key is the entity `id`.
 * Holds no state beyond the table name and the engine components built on the shared client.
 */
export class DynamoBaseRepository<T extends DynamoEntity> implements IRepository<T> {
    protected readonly logger: ILogger;
    protected readonly keys: KeyBuilder;
    protected readonly capabilities: CapabilityInjector;
    protected readonly items: ItemAccessor<T>;
    protected readonly batch: BatchWriter<T>;
    protected readonly queries: QueryEngine<T>;
    protected readonly scans: ScanEngine<T>;

    constructor(
        public readonly tableName: string,
        protected readonly codec: IEntityCodec<T>,
        deps: RepositoryDependencies,
    ) {
        const { client, logger, settings, clock } = deps;
        this.logger = logger;
        this.keys = new KeyBuilder();
        this.capabilities = new CapabilityInjector(clock);
        this.items = new ItemAccessor(client, tableName, codec, logger);
        this.batch = new BatchWriter(client, tableName, codec, logger, settings, clock);
        this.queries = new QueryEngine(client, tableName, codec, logger);
        this.scans = new ScanEngine(client, tableName, codec, logger);
    }

    async save(entity: T): Promise<void> {
        this.capabilities.prepareForCreate(entity);
        await this.items.put(entity);
        this.logger.debug(`${this.codec.entityName} saved`, { id: entity.id, tableName: this.tableName });
    }

    async saveBatch(entities: readonly T[], signal?: AbortSignal): Promise<BatchWriteResult> {
        entities.forEach(entity => this.capabilities.prepareForCreate(entity));
        return this.batch.writeAll(entities, signal);
    }

    async saveIfNotExists(entity: T): Promise<void> {
        this.capabilities.prepareForCreate(entity);
        await this.items.put(entity, {
            conditionExpression: 'attribute_not_exists(#pk)',
            expressionAttributeNames: { '#pk': APP_CONSTANTS.PARTITION_KEY },
        });
        this.logger.info(`${this.codec.entityName} created`, { id: entity.id, tableName: this.tableName });
    }

    async findById(id: string): Promise<T | null> {
        return this.items.get(this.keys.simpleKey(id));
    }

    async findByIdConsistent(id: string): Promise<T | null> {
        return this.items.get(this.keys.simpleKey(id), true);
    }

    async exists(id: string): Promise<boolean> {
        return (await this.findById(id)) !== null;
    }

    async delete(entity: T): Promise<void> {
        await this.deleteById(entity.id);
    }

    async deleteById(id: string): Promise<void> {
        await this.items.delete(this.keys.simpleKey(id));
        this.logger.debug(`${this.codec.entityName} deleted`, { id, tableName: this.tableName });
    }

    async deleteBatchByIds(ids: readonly string[], signal?: AbortSignal): Promise<BatchWriteResult> {
        return this.batch.deleteAll(ids.map(id => this.keys.simpleKey(id)), signal);
    }

    /**
     * Writes the assignments to the stored item, stamping `updatedAt` and the next
     * version from the in-memory entity. The entity itself is left unchanged.
     * @throws {ConditionFailedError} when the item is missing, the stored version no longer matches or the caller's condition is false.
     */
    async update(entity: T, options: UpdateOptions): Promise<T | null> {
        const stamps = this.capabilities.prepareForUpdate(entity, options.assignments, options.optimisticLock ?? true);
        return this.items.update(this.keys.simpleKey(entity.id), stamps.assignments, toItemUpdate(options, stamps));
    }

    async updateById(id: string, options: UpdateOptions): Promise<T | null> {
        const stamps = this.capabilities.prepareForUpdateById(this.codec, options.assignments);
        return this.items.update(this.keys.simpleKey(id), stamps.assignments, toItemUpdate(options, stamps));
    }

    async query(options: QueryOptions): Promise<T[]> {
        return this.queries.query(options);
    }

    /** Decodes each item with `codec`, for projections that leave out required attributes. */
    async queryAs<P>(codec: IEntityCodec<P>, options: QueryOptions): Promise<P[]> {
        return this.queries.queryAs(codec, options);
    }

    async queryWithPaging(options: PaginatedQueryOptions): Promise<PageResult<T>> {
        return this.queries.queryPage(options);
    }

    async queryWithPagingAs<P>(codec: IEntityCodec<P>, options: PaginatedQueryOptions): Promise<PageResult<P>> {
        return this.queries.queryPageAs(codec, options);
    }

    async count(options: QueryOptions): Promise<number> {
        return this.queries.count(options);
    }

    /** Reads the whole table; cost grows with table size. */
    async scan(options: ScanOptions = {}, signal?: AbortSignal): Promise<T[]> {
        return this.scans.scanAll(options, signal);
    }

    async scanAs<P>(codec: IEntityCodec<P>, options: ScanOptions = {}, signal?: AbortSignal): Promise<P[]> {
        return this.scans.scanAllAs(codec, options, signal);
    }

    async scanWithPaging(options: PaginatedScanOptions = {}): Promise<PageResult<T>> {
        return this.scans.scanPage(options);
    }

    async scanWithPagingAs<P>(codec: IEntityCodec<P>, options: PaginatedScanOptions = {}): Promise<PageResult<P>> {
        return this.scans.scanPageAs(codec, options);
    }
}

// UpdateItem upserts; updates here require an existing item
const ITEM_EXISTS = 'attribute_exists(#pk)';

function toItemUpdate(options: UpdateOptions, stamps: UpdateStamps): ItemUpdateOptions {
    const guard = stamps.versionGuard;
    const conditions = [ITEM_EXISTS, options.conditionExpression, guard?.conditionExpression].filter(
        (condition): condition is string => Boolean(condition),
    );
    return {
        conditionExpression: conditions.length > 1 ? conditions.map(c => `(${c})`).join(' AND ') : ITEM_EXISTS,
        expressionAttributeNames: mergeAttributeMaps(
            { '#pk': APP_CONSTANTS.PARTITION_KEY },
            options.expressionAttributeNames,
            guard?.expressionAttributeNames,
        ),
        expressionAttributeValues: mergeAttributeMaps(options.expressionAttributeValues, guard?.expressionAttributeValues),
        returnUpdated: options.returnUpdated,
        increments: stamps.increments,
    };
}
