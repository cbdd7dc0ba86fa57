import { z } from 'zod';
import { IConfigService } from '../../application/interfaces/IConfigService';
import { APP_CONSTANTS, DATA_ACCESS_DEFAULTS } from '../../shared/constants';
import { ValidationError } from '../../shared/errors/BaseError';

const positiveInt = z.number().int().positive();

export const dataAccessSettingsSchema = z.object({
    maxBatchSize: positiveInt.max(DATA_ACCESS_DEFAULTS.MAX_BATCH_WRITE_ITEMS),
    maxAttempts: positiveInt,
    baseDelayMs: z.number().int().nonnegative(),
    tableCreationTimeoutMs: positiveInt,
    tableActivePollIntervalMs: positiveInt,
    tableNames: z.object({
        products: z.string().min(3),
        brands: z.string().min(3),
        categories: z.string().min(3),
    }),
});

export type DataAccessSettings = z.infer<typeof dataAccessSettingsSchema>;

export const DEFAULT_DATA_ACCESS_SETTINGS: DataAccessSettings = {
    maxBatchSize: DATA_ACCESS_DEFAULTS.MAX_BATCH_WRITE_ITEMS,
    maxAttempts: DATA_ACCESS_DEFAULTS.MAX_BATCH_WRITE_ATTEMPTS,
    baseDelayMs: DATA_ACCESS_DEFAULTS.BATCH_WRITE_BASE_DELAY_MS,
    tableCreationTimeoutMs: DATA_ACCESS_DEFAULTS.TABLE_CREATION_TIMEOUT_MS,
    tableActivePollIntervalMs: DATA_ACCESS_DEFAULTS.TABLE_ACTIVE_POLL_INTERVAL_MS,
    tableNames: {
        products: APP_CONSTANTS.DEFAULT_TABLE_NAMES.PRODUCTS,
        brands: APP_CONSTANTS.DEFAULT_TABLE_NAMES.BRANDS,
        categories: APP_CONSTANTS.DEFAULT_TABLE_NAMES.CATEGORIES,
    },
};

/**
 * Reads the engine settings from configuration, falling back to the store defaults.
 * @throws {ValidationError} listing every invalid key.
 */
export function loadDataAccessSettings(config: IConfigService): DataAccessSettings {
    const defaults = DEFAULT_DATA_ACCESS_SETTINGS;
    const candidate = {
        maxBatchSize: config.getNumber('BATCH_WRITE_MAX_ITEMS', defaults.maxBatchSize),
        maxAttempts: config.getNumber('BATCH_WRITE_MAX_ATTEMPTS', defaults.maxAttempts),
        baseDelayMs: config.getNumber('BATCH_WRITE_BASE_DELAY_MS', defaults.baseDelayMs),
        tableCreationTimeoutMs: config.getNumber('TABLE_CREATION_TIMEOUT_MS', defaults.tableCreationTimeoutMs),
        tableActivePollIntervalMs: config.getNumber('TABLE_ACTIVE_POLL_INTERVAL_MS', defaults.tableActivePollIntervalMs),
        tableNames: {
            products: config.get('PRODUCTS_TABLE_NAME', defaults.tableNames.products),
            brands: config.get('BRANDS_TABLE_NAME', defaults.tableNames.brands),
            categories: config.get('CATEGORIES_TABLE_NAME', defaults.tableNames.categories),
        },
    };

    const result = dataAccessSettingsSchema.safeParse(candidate);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError('Invalid data-access settings', { issues });
    }
    return result.data;
}
