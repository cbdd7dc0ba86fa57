import 'reflect-metadata';

const mockDevelopmentFormat = { type: 'mockDevelopmentFormat' };
const mockProductionFormat = { type: 'mockProductionFormat' };
jest.mock('@src/shared/utils/logFormat', () => ({
    LogFormats: {
        developmentFormat: mockDevelopmentFormat,
        productionFormat: mockProductionFormat,
    },
}));

const mockWinstonLoggerInstance = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
};

jest.mock('winston', () => {
    const format = Object.assign(jest.fn(() => jest.fn(() => ({ type: 'traceFormat' }))), {
        combine: jest.fn((...formats: unknown[]) => ({ combined: formats })),
    });
    return {
        createLogger: jest.fn(() => mockWinstonLoggerInstance),
        transports: {
            Console: jest.fn((options: unknown) => ({ options })),
        },
        format,
    };
});

import winston from 'winston';
import { WinstonLogger } from '@src/infrastructure/logging/WinstonLogger';
import { StaticConfigService } from '../../../mocks/config.mock';

describe('WinstonLogger', () => {
    const createLogger = jest.mocked(winston.createLogger);
    const Console = jest.mocked(winston.transports.Console);

    const build = (values: Record<string, string> = {}) =>
        new WinstonLogger(new StaticConfigService({ NODE_ENV: 'production', LOG_LEVEL: 'warn', ...values }));

    describe('initialization', () => {
        it('should create a logger at the configured level with the service name', () => {
            build();

            expect(createLogger).toHaveBeenCalledTimes(1);
            expect(createLogger).toHaveBeenCalledWith(expect.objectContaining({
                level: 'warn',
                defaultMeta: { service: 'catalog-data-access' },
            }));
        });

        it('should use the production format outside development', () => {
            build();

            expect(winston.format.combine).toHaveBeenCalledWith({ type: 'traceFormat' }, mockProductionFormat);
        });

        it('should use the development format in development', () => {
            build({ NODE_ENV: 'development' });

            expect(winston.format.combine).toHaveBeenCalledWith({ type: 'traceFormat' }, mockDevelopmentFormat);
        });

        it('should use the development format when NODE_ENV is not set', () => {
            new WinstonLogger(new StaticConfigService({ LOG_LEVEL: 'warn' }));

            expect(winston.format.combine).toHaveBeenCalledWith({ type: 'traceFormat' }, mockDevelopmentFormat);
            expect(Console).toHaveBeenCalledWith({ level: 'warn', silent: false });
        });

        it('should silence the console in tests unless LOG_IN_TESTS is set', () => {
            build({ NODE_ENV: 'test' });
            build({ NODE_ENV: 'test', LOG_IN_TESTS: 'true' });

            expect(Console).toHaveBeenNthCalledWith(1, { level: 'warn', silent: true });
            expect(Console).toHaveBeenNthCalledWith(2, { level: 'warn', silent: false });
        });
    });

    describe('logging methods', () => {
        let logger: WinstonLogger;

        beforeEach(() => {
            logger = build();
        });

        it('should forward info, warn and debug with their metadata', () => {
            logger.info('Product saved', { id: 'p1' });
            logger.warn('Batch incomplete', { remaining: 2 });
            logger.debug('Scanned Products');

            expect(mockWinstonLoggerInstance.info).toHaveBeenCalledWith('Product saved', { id: 'p1' });
            expect(mockWinstonLoggerInstance.warn).toHaveBeenCalledWith('Batch incomplete', { remaining: 2 });
            expect(mockWinstonLoggerInstance.debug).toHaveBeenCalledWith('Scanned Products', undefined);
        });

        it('should serialize an Error passed to error()', () => {
            const failure = new Error('boom');

            logger.error('PutItem failed', failure, { tableName: 'Products' });

            expect(mockWinstonLoggerInstance.error).toHaveBeenCalledWith('PutItem failed', {
                tableName: 'Products',
                error: { name: 'Error', message: 'boom', stack: failure.stack },
            });
        });

        it('should pass a non-Error value through', () => {
            logger.error('Unexpected rejection', 'text');

            expect(mockWinstonLoggerInstance.error).toHaveBeenCalledWith('Unexpected rejection', { error: 'text' });
        });

        it('should ignore empty messages', () => {
            logger.info('');
            logger.error('');

            expect(mockWinstonLoggerInstance.info).not.toHaveBeenCalled();
            expect(mockWinstonLoggerInstance.error).not.toHaveBeenCalled();
        });
    });
});
