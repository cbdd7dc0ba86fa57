import { AttributeValue } from '@aws-sdk/client-dynamodb';

/** Wire representation of one stored item. */
export type AttributeMap = Record<string, AttributeValue>;

/** Attribute-value map identifying exactly one stored item. */
export type Key = Record<string, AttributeValue>;

/**
 * Expression placeholders shared by conditions, filters, key conditions and projections.
 * Values are native and marshalled by the entity codec before they are sent.
 */
export interface ExpressionAttributes {
    expressionAttributeNames?: Record<string, string>;
    expressionAttributeValues?: Record<string, unknown>;
}

export interface QueryOptions extends ExpressionAttributes {
    indexName?: string;
    keyConditionExpression?: string;
    filterExpression?: string;
    projectionExpression?: string;
    /** Ascending by sort key unless explicitly `false`. */
    scanIndexForward?: boolean;
    limit?: number;
    /** Eventually consistent unless explicitly `true`. */
    consistentRead?: boolean;
}

export interface PaginatedQueryOptions extends Omit<QueryOptions, 'limit'> {
    exclusiveStartKey?: Key;
    pageSize?: number;
}

export interface ScanOptions extends ExpressionAttributes {
    indexName?: string;
    filterExpression?: string;
    projectionExpression?: string;
    consistentRead?: boolean;
    /** Per-request evaluation limit; the exhaustive scan still follows every page. */
    limit?: number;
}

export interface PaginatedScanOptions extends Omit<ScanOptions, 'limit'> {
    exclusiveStartKey?: Key;
    pageSize?: number;
}

export interface PageResult<T> {
    items: T[];
    hasMore: boolean;
    /** Store page boundary to pass back as `exclusiveStartKey`; absent once exhausted. */
    lastEvaluatedKey?: Key;
}

export interface UpdateOptions extends ExpressionAttributes {
    /**
     * Attributes to SET. Numbers are written as numbers, everything else as text:
     * booleans become 'true'/'false' and lists and maps become JSON strings, which a
     * schema expecting those types rejects on read. Change such attributes with save.
     */
    assignments: Record<string, unknown>;
    conditionExpression?: string;
    /** Resolve to the stored item as it reads after the update. */
    returnUpdated?: boolean;
    /**
     * Guard updates of versioned entities with their in-memory version.
     * Defaults to `true`; only consulted by `update(entity, ...)`.
     */
    optimisticLock?: boolean;
}

export interface BatchWriteResult {
    writtenCount: number;
}
