import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { TYPES } from './shared/constants/types';

// --- Interfaces (Ports) ---
import { IBrandRepository } from './application/interfaces/IBrandRepository';
import { ICategoryRepository } from './application/interfaces/ICategoryRepository';
import { IConfigService } from './application/interfaces/IConfigService';
import { ILogger } from './application/interfaces/ILogger';
import { IProductRepository } from './application/interfaces/IProductRepository';

// --- Infrastructure - Config & Logging ---
import { DataAccessSettings, loadDataAccessSettings } from './infrastructure/config/dataAccessSettings';
import { EnvironmentConfigService } from './infrastructure/config/EnvironmentConfigService';
import { WinstonLogger } from './infrastructure/logging/WinstonLogger';
import { Clock, SystemClock } from './shared/utils/clock';

// --- Infrastructure - Persistence ---
import { RepositoryFactory } from './infrastructure/factories/RepositoryFactory';
import { DynamoBrandRepository } from './infrastructure/persistence/dynamodb/DynamoBrandRepository';
import { DynamoCategoryRepository } from './infrastructure/persistence/dynamodb/DynamoCategoryRepository';
import { DynamoDBProvider } from './infrastructure/persistence/dynamodb/dynamodb.client';
import { DynamoProductRepository } from './infrastructure/persistence/dynamodb/DynamoProductRepository';
import { TableManager } from './infrastructure/persistence/dynamodb/engine/TableManager';


// --- Register Infrastructure Services ---
container.registerSingleton<IConfigService>(TYPES.ConfigService, EnvironmentConfigService);
container.registerSingleton<ILogger>(TYPES.Logger, WinstonLogger);
container.registerSingleton<Clock>(TYPES.Clock, SystemClock);

container.register<DataAccessSettings>(TYPES.DataAccessSettings, {
    useFactory: instanceCachingFactory(c => loadDataAccessSettings(c.resolve<IConfigService>(TYPES.ConfigService))),
});

// The provider's optional client parameter is for tests only
container.register<DynamoDBProvider>(TYPES.DynamoDBProvider, {
    useFactory: instanceCachingFactory(c => new DynamoDBProvider(c.resolve<IConfigService>(TYPES.ConfigService))),
});

container.registerSingleton<TableManager>(TYPES.TableManager, TableManager);


// --- Register Persistence Repositories ---
container.registerSingleton<IProductRepository>(TYPES.ProductRepository, DynamoProductRepository);
container.registerSingleton<IBrandRepository>(TYPES.BrandRepository, DynamoBrandRepository);
container.registerSingleton<ICategoryRepository>(TYPES.CategoryRepository, DynamoCategoryRepository);
container.registerSingleton<RepositoryFactory>(TYPES.RepositoryFactory, RepositoryFactory);


export { container };
