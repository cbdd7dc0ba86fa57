import { setTimeout as sleep } from 'timers/promises';
import { injectable } from 'tsyringe';

/**
 * Source of time for the data-access engine.
 */
export interface Clock {
    /** Current instant in Unix seconds. */
    now(): number;
    /** Milliseconds from an arbitrary origin; only differences are meaningful. */
    elapsedMs(): number;
    /** Resolves after `ms`; rejects with an AbortError once `signal` fires. */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

@injectable()
export class SystemClock implements Clock {
    now(): number {
        return Math.floor(Date.now() / 1000);
    }

    elapsedMs(): number {
        return performance.now();
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        await sleep(ms, undefined, { signal });
    }
}
