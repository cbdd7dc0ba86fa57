import { inject, injectable } from 'tsyringe';
import { ICategoryRepository } from '../../../application/interfaces/ICategoryRepository';
import { ILogger } from '../../../application/interfaces/ILogger';
import { Category } from '../../../domain/entities/Category';
import { TYPES } from '../../../shared/constants/types';
import { Clock } from '../../../shared/utils/clock';
import { DataAccessSettings } from '../../config/dataAccessSettings';
import { categoryCodec } from './codecs';
import { DynamoBaseRepository } from './DynamoBaseRepository';
import { DynamoDBProvider } from './dynamodb.client';

@injectable()
export class DynamoCategoryRepository extends DynamoBaseRepository<Category> implements ICategoryRepository {
    constructor(
        @inject(TYPES.DynamoDBProvider) provider: DynamoDBProvider,
        @inject(TYPES.Logger) logger: ILogger,
        @inject(TYPES.DataAccessSettings) settings: DataAccessSettings,
        @inject(TYPES.Clock) clock: Clock,
    ) {
        super(settings.tableNames.categories, categoryCodec, { client: provider.client, logger, settings, clock });
    }

    async findByName(name: string): Promise<Category[]> {
        return this.scan({
            filterExpression: '#name = :name',
            expressionAttributeNames: { '#name': 'name' },
            expressionAttributeValues: { ':name': name },
        });
    }
}
