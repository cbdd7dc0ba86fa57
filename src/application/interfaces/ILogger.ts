/**
 * Defines the contract for logging services used by the data-access engine.
 */
export interface ILogger {
    info(message: string, meta?: Record<string, unknown>): void;

    warn(message: string, meta?: Record<string, unknown>): void;

    /**
     * Logs an error message.
     * @param error - Error instance, or any other value describing the failure.
     */
    error(message: string, error?: unknown, meta?: Record<string, unknown>): void;

    debug(message: string, meta?: Record<string, unknown>): void;
}
