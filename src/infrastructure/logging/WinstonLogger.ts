import { context, trace } from '@opentelemetry/api';
import { inject, injectable } from 'tsyringe';
import winston from 'winston';
import { IConfigService } from '../../application/interfaces/IConfigService';
import { ILogger } from '../../application/interfaces/ILogger';
import { TYPES } from '../../shared/constants/types';
import { LogFormats } from '../../shared/utils/logFormat';

@injectable()
export class WinstonLogger implements ILogger {
    private _logger: winston.Logger;

    constructor(
        @inject(TYPES.ConfigService) private configService: IConfigService
    ) {
        this._logger = this.initializeLogger();
    }

    private initializeLogger(): winston.Logger {
        const logLevel = this.configService.get('LOG_LEVEL', 'info');

        const traceFormat = winston.format((info) => {
            const span = trace.getSpan(context.active());
            if (span) {
                const { traceId, spanId } = span.spanContext();
                info.trace_id = traceId;
                info.span_id = spanId;
            }
            return info;
        });

        const baseFormat = this.configService.isDevelopment() ? LogFormats.developmentFormat : LogFormats.productionFormat;

        const logger = winston.createLogger({
            level: logLevel,
            defaultMeta: { service: this.configService.get('SERVICE_NAME', 'catalog-data-access') },
            format: winston.format.combine(traceFormat(), baseFormat),
            transports: [
                new winston.transports.Console({
                    level: logLevel,
                    silent: this.configService.isTest() && !this.configService.getBoolean('LOG_IN_TESTS', false),
                })
            ]
        });

        return logger;
    }

    info(message: string, meta?: Record<string, unknown>): void {
        if (!message) return;
        this._logger.info(message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        if (!message) return;
        this._logger.warn(message, meta);
    }

    error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
        if (!message) return;

        let logMeta: Record<string, unknown> = meta ?? {};
        if (error !== undefined) {
            if (error instanceof Error) {
                logMeta = {
                    ...logMeta,
                    error: {
                        name: error.name,
                        message: error.message,
                        stack: error.stack,
                    },
                };
            } else {
                logMeta = { ...logMeta, error };
            }
        }

        this._logger.error(message, logMeta);
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        if (!message) return;
        this._logger.debug(message, meta);
    }
}
