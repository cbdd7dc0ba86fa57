export const APP_CONSTANTS = {
    VERSION: '1.0.0',
    SERVICE_NAME: 'catalog-data-access',
    /** Hash key of every table created with the default definition. */
    PARTITION_KEY: 'id',
    TIMESTAMP_ATTRIBUTES: {
        CREATED_AT: 'createdAt',
        UPDATED_AT: 'updatedAt',
    },
    VERSION_ATTRIBUTE: 'version',
    DEFAULT_TABLE_NAMES: {
        PRODUCTS: 'Products',
        BRANDS: 'Brands',
        CATEGORIES: 'Categories',
    },
} as const;

/**
 * Store limits and retry budget. Passed to the engine through `DataAccessSettings`
 * so they can be lowered per instance.
 */
export const DATA_ACCESS_DEFAULTS = {
    /** BatchWriteItem accepts at most 25 requests per call. */
    MAX_BATCH_WRITE_ITEMS: 25,
    MAX_BATCH_WRITE_ATTEMPTS: 3,
    BATCH_WRITE_BASE_DELAY_MS: 100,
    TABLE_CREATION_TIMEOUT_MS: 5 * 60 * 1000,
    TABLE_ACTIVE_POLL_INTERVAL_MS: 5000,
} as const;
