export { container } from './container';
export { TYPES } from './shared/constants/types';
export { APP_CONSTANTS, DATA_ACCESS_DEFAULTS } from './shared/constants';

export type { IBrandRepository } from './application/interfaces/IBrandRepository';
export type { ICategoryRepository } from './application/interfaces/ICategoryRepository';
export type { IConfigService } from './application/interfaces/IConfigService';
export type { ILogger } from './application/interfaces/ILogger';
export type { IProductRepository } from './application/interfaces/IProductRepository';
export type { IRepository } from './application/interfaces/IRepository';

export * from './domain/entities/Brand';
export * from './domain/entities/Category';
export * from './domain/entities/DynamoEntity';
export * from './domain/entities/Product';
export * from './domain/exceptions/DataAccessError';
export { BaseError, ValidationError } from './shared/errors/BaseError';
export * from './shared/types/query.types';
export { SystemClock } from './shared/utils/clock';
export type { Clock } from './shared/utils/clock';

export { DEFAULT_DATA_ACCESS_SETTINGS, loadDataAccessSettings } from './infrastructure/config/dataAccessSettings';
export type { DataAccessSettings } from './infrastructure/config/dataAccessSettings';
export { EnvironmentConfigService } from './infrastructure/config/EnvironmentConfigService';
export { RepositoryFactory } from './infrastructure/factories/RepositoryFactory';
export { WinstonLogger } from './infrastructure/logging/WinstonLogger';
export { registry as metricsRegistry } from './infrastructure/monitoring/metrics';
export { brandCodec, categoryCodec, productCodec, productSummaryCodec } from './infrastructure/persistence/dynamodb/codecs';
export { DynamoBaseRepository } from './infrastructure/persistence/dynamodb/DynamoBaseRepository';
export type { RepositoryDependencies } from './infrastructure/persistence/dynamodb/DynamoBaseRepository';
export { DynamoBrandRepository } from './infrastructure/persistence/dynamodb/DynamoBrandRepository';
export { DynamoCategoryRepository } from './infrastructure/persistence/dynamodb/DynamoCategoryRepository';
export { DynamoDBProvider } from './infrastructure/persistence/dynamodb/dynamodb.client';
export { DynamoProductRepository } from './infrastructure/persistence/dynamodb/DynamoProductRepository';
export { BatchWriter } from './infrastructure/persistence/dynamodb/engine/BatchWriter';
export type { BatchWriterSettings } from './infrastructure/persistence/dynamodb/engine/BatchWriter';
export { CapabilityInjector } from './infrastructure/persistence/dynamodb/engine/CapabilityInjector';
export { EntityCodec } from './infrastructure/persistence/dynamodb/engine/EntityCodec';
export type { EntityCodecOptions, IEntityCodec } from './infrastructure/persistence/dynamodb/engine/EntityCodec';
export { ItemAccessor } from './infrastructure/persistence/dynamodb/engine/ItemAccessor';
export { KeyBuilder } from './infrastructure/persistence/dynamodb/engine/KeyBuilder';
export { QueryEngine } from './infrastructure/persistence/dynamodb/engine/QueryEngine';
export { ScanEngine } from './infrastructure/persistence/dynamodb/engine/ScanEngine';
export { TableManager } from './infrastructure/persistence/dynamodb/engine/TableManager';
export type { TableDefinition } from './infrastructure/persistence/dynamodb/engine/TableManager';
