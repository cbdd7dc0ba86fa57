import {
    BatchWriteResult,
    PageResult,
    PaginatedQueryOptions,
    PaginatedScanOptions,
    QueryOptions,
    ScanOptions,
    UpdateOptions,
} from '../../shared/types/query.types';
import { IEntityCodec } from './IEntityCodec';

/**
 * Generic repository over one table keyed by the entity's `id`.
 * Reads of a missing item resolve to `null`; every failure rejects with a DataAccessError.
 *
 * Query and scan results are decoded as full entities. Reads that project away
 * required attributes go through the `...As` variants with a codec for the projected shape.
 */
export interface IRepository<T> {
    /** Full put: overwrites any existing item and re-stamps creation time and version. */
    save(entity: T): Promise<void>;
    saveBatch(entities: readonly T[], signal?: AbortSignal): Promise<BatchWriteResult>;
    /** Fails with ConditionFailedError when an item with the same id exists. */
    saveIfNotExists(entity: T): Promise<void>;

    findById(id: string): Promise<T | null>;
    findByIdConsistent(id: string): Promise<T | null>;
    exists(id: string): Promise<boolean>;

    delete(entity: T): Promise<void>;
    deleteById(id: string): Promise<void>;
    deleteBatchByIds(ids: readonly string[], signal?: AbortSignal): Promise<BatchWriteResult>;

    /** Fails with ConditionFailedError when the item does not exist. */
    update(entity: T, options: UpdateOptions): Promise<T | null>;
    /** Fails with ConditionFailedError when the item does not exist. */
    updateById(id: string, options: UpdateOptions): Promise<T | null>;

    query(options: QueryOptions): Promise<T[]>;
    queryAs<P>(codec: IEntityCodec<P>, options: QueryOptions): Promise<P[]>;
    queryWithPaging(options: PaginatedQueryOptions): Promise<PageResult<T>>;
    queryWithPagingAs<P>(codec: IEntityCodec<P>, options: PaginatedQueryOptions): Promise<PageResult<P>>;
    count(options: QueryOptions): Promise<number>;

    scan(options?: ScanOptions, signal?: AbortSignal): Promise<T[]>;
    scanAs<P>(codec: IEntityCodec<P>, options?: ScanOptions, signal?: AbortSignal): Promise<P[]>;
    scanWithPaging(options?: PaginatedScanOptions): Promise<PageResult<T>>;
    scanWithPagingAs<P>(codec: IEntityCodec<P>, options?: PaginatedScanOptions): Promise<PageResult<P>>;
}
