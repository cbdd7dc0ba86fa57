import { inject, injectable } from 'tsyringe';
import { ILogger } from '../../application/interfaces/ILogger';
import { DynamoEntity } from '../../domain/entities/DynamoEntity';
import { TYPES } from '../../shared/constants/types';
import { Clock } from '../../shared/utils/clock';
import { DataAccessSettings } from '../config/dataAccessSettings';
import { DynamoBaseRepository } from '../persistence/dynamodb/DynamoBaseRepository';
import { DynamoDBProvider } from '../persistence/dynamodb/dynamodb.client';
import { IEntityCodec } from '../persistence/dynamodb/engine/EntityCodec';

/**
 * Builds repositories for entity types that have no dedicated class,
 * sharing the container's client, logger, settings and clock.
 */
@injectable()
export class RepositoryFactory {
    constructor(
        @inject(TYPES.DynamoDBProvider) private provider: DynamoDBProvider,
        @inject(TYPES.Logger) private logger: ILogger,
        @inject(TYPES.DataAccessSettings) private settings: DataAccessSettings,
        @inject(TYPES.Clock) private clock: Clock,
    ) { }

    public create<T extends DynamoEntity>(tableName: string, codec: IEntityCodec<T>): DynamoBaseRepository<T> {
        if (!tableName) {
            throw new Error('A table name is required to create a repository');
        }
        return new DynamoBaseRepository(tableName, codec, {
            client: this.provider.client,
            logger: this.logger,
            settings: this.settings,
            clock: this.clock,
        });
    }
}
