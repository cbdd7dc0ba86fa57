// src/application/interfaces/IConfigService.ts

/**
 * Defines the contract for accessing configuration values.
 * Undefined and empty-string values are both treated as "not set".
 */
export interface IConfigService {
    /**
     * Retrieves a configuration value, or the default when it is not set.
     */
    get(key: string): string | undefined;
    get(key: string, defaultValue: string): string;

    /**
     * Retrieves a configuration value.
     * @throws {Error} If the value is missing or empty.
     */
    getOrThrow(key: string): string;

    /**
     * Retrieves a configuration value parsed as a number.
     * @throws {Error} If the value is not numeric and no default is provided.
     */
    getNumber(key: string): number | undefined;
    getNumber(key: string, defaultValue: number): number;

    /**
     * Retrieves a configuration value parsed as a boolean.
     * Accepts 'true'/'1' and 'false'/'0', case-insensitive.
     */
    getBoolean(key: string): boolean | undefined;
    getBoolean(key: string, defaultValue: boolean): boolean;

    /** True when NODE_ENV is 'development' or not set. */
    isDevelopment(): boolean;
    isTest(): boolean;
    /** All values, with sensitive keys masked. */
    getAllConfig(): Record<string, string | undefined>;
    has(key: string): boolean;
}
