import { injectable } from 'tsyringe';
import { IConfigService } from '../../application/interfaces/IConfigService';

const MASK = '********';

@injectable()
export class EnvironmentConfigService implements IConfigService {
    private readonly config: Record<string, string | undefined>;
    private readonly requiredKeys: string[] = [
        'NODE_ENV',
        'LOG_LEVEL',
        'AWS_REGION',
    ];

    // Keys whose values are masked in getAllConfig()
    private readonly sensitiveKeyPatterns: RegExp[] = [
        /password/i,
        /secret/i,
        /(access|private)_?key/i,
        /token/i,
    ];

    constructor() {
        this.config = process.env;
        const missingKeys = this.requiredKeys.filter(key => !this.isSet(key));
        if (missingKeys.length > 0) {
            const errorMsg = `[ConfigService] Missing or empty required environment variables: ${missingKeys.join(', ')}`;
            console.error(errorMsg);
            throw new Error(errorMsg);
        }
        console.info('[ConfigService] Required configuration keys verified.');
    }

    get(key: string): string | undefined;
    get(key: string, defaultValue: string): string;
    get(key: string, defaultValue?: string): string | undefined {
        const value = this.config[key];
        if (value === undefined || value === '') {
            return defaultValue;
        }
        return value;
    }

    getOrThrow(key: string): string {
        const value = this.config[key];
        if (value === undefined || value === '') {
            throw new Error(`Configuration error: Required environment variable "${key}" is missing or empty.`);
        }
        return value;
    }

    getNumber(key: string): number | undefined;
    getNumber(key: string, defaultValue: number): number;
    getNumber(key: string, defaultValue?: number): number | undefined {
        const value = this.config[key];
        if (value === undefined || value === '') {
            return defaultValue;
        }

        const num = parseFloat(value);
        if (isNaN(num)) {
            if (defaultValue !== undefined) {
                console.warn(`[ConfigService] Value for key "${key}" ("${value}") is not a valid number. Using default value: ${defaultValue}`);
                return defaultValue;
            }
            throw new Error(`Configuration error: Environment variable "${key}" is not a valid number ("${value}").`);
        }
        return num;
    }

    getBoolean(key: string): boolean | undefined;
    getBoolean(key: string, defaultValue: boolean): boolean;
    getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
        const raw = this.config[key];
        if (raw === undefined || raw === '') {
            return defaultValue;
        }

        const parsed = parseBoolean(raw);
        if (parsed !== undefined) {
            return parsed;
        }
        if (defaultValue !== undefined) {
            console.warn(`[ConfigService] Value for key "${key}" ("${raw}") is not a valid boolean. Using default value: ${defaultValue}`);
            return defaultValue;
        }
        throw new Error(`Configuration error: Environment variable "${key}" is not a valid boolean ("${raw}"). Expected 'true', 'false', '1', or '0'.`);
    }

    /**
     * Use with caution when logging: only values matching a sensitive pattern are masked.
     */
    getAllConfig(): Record<string, string | undefined> {
        const filteredConfig: Record<string, string | undefined> = {};
        for (const key of Object.keys(this.config)) {
            const isSensitive = this.sensitiveKeyPatterns.some(pattern => pattern.test(key));
            filteredConfig[key] = isSensitive ? MASK : this.config[key];
        }
        return filteredConfig;
    }

    has(key: string): boolean {
        // Present even when empty
        return this.config[key] !== undefined;
    }

    isDevelopment(): boolean {
        return this.get('NODE_ENV', 'development') === 'development';
    }

    isTest(): boolean {
        return this.get('NODE_ENV') === 'test';
    }

    private isSet(key: string): boolean {
        return this.has(key) && this.config[key] !== '';
    }
}

function parseBoolean(value: string): boolean | undefined {
    const processed = value.trim().toLowerCase();
    if (processed === 'true' || processed === '1') {
        return true;
    }
    if (processed === 'false' || processed === '0') {
        return false;
    }
    return undefined;
}
