import { Product, ProductProps } from '../../src/domain/entities/Product';
import { DataAccessSettings } from '../../src/infrastructure/config/dataAccessSettings';
import { Clock } from '../../src/shared/utils/clock';

export const NOW = 1_700_000_000;

/**
 * Clock that never waits: sleeps are recorded and advance elapsed time instantly.
 * `onSleep` runs before a sleep resolves, so a test can abort mid-backoff.
 */
export class FakeClock implements Clock {
    public readonly sleeps: number[] = [];
    public onSleep?: (ms: number) => void;
    private elapsed = 0;

    constructor(public seconds: number = NOW) { }

    now(): number {
        return this.seconds;
    }

    elapsedMs(): number {
        return this.elapsed;
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        this.sleeps.push(ms);
        this.onSleep?.(ms);
        if (signal?.aborted) {
            const abort = new Error('The operation was aborted');
            abort.name = 'AbortError';
            throw abort;
        }
        this.elapsed += ms;
    }
}

export const testSettings = (overrides: Partial<DataAccessSettings> = {}): DataAccessSettings => ({
    maxBatchSize: 25,
    maxAttempts: 3,
    baseDelayMs: 100,
    tableCreationTimeoutMs: 300_000,
    tableActivePollIntervalMs: 5000,
    tableNames: { products: 'Products', brands: 'Brands', categories: 'Categories' },
    ...overrides,
});

export const makeProduct = (overrides: Partial<ProductProps> = {}): Product => new Product({
    id: 'p1',
    name: 'Widget',
    price: 9.99,
    ...overrides,
});

export const awsError = (name: string, message = name): Error => {
    const error = new Error(message);
    error.name = name;
    return error;
};
