import { inject, injectable } from 'tsyringe';
import { IBrandRepository } from '../../../application/interfaces/IBrandRepository';
import { ILogger } from '../../../application/interfaces/ILogger';
import { Brand } from '../../../domain/entities/Brand';
import { TYPES } from '../../../shared/constants/types';
import { Clock } from '../../../shared/utils/clock';
import { DataAccessSettings } from '../../config/dataAccessSettings';
import { brandCodec } from './codecs';
import { DynamoBaseRepository } from './DynamoBaseRepository';
import { DynamoDBProvider } from './dynamodb.client';

@injectable()
export class DynamoBrandRepository extends DynamoBaseRepository<Brand> implements IBrandRepository {
    constructor(
        @inject(TYPES.DynamoDBProvider) provider: DynamoDBProvider,
        @inject(TYPES.Logger) logger: ILogger,
        @inject(TYPES.DataAccessSettings) settings: DataAccessSettings,
        @inject(TYPES.Clock) clock: Clock,
    ) {
        super(settings.tableNames.brands, brandCodec, { client: provider.client, logger, settings, clock });
    }

    /** Exact, case-sensitive match; scans the whole table. */
    async findByName(name: string): Promise<Brand[]> {
        return this.scan({
            filterExpression: '#name = :name',
            expressionAttributeNames: { '#name': 'name' },
            expressionAttributeValues: { ':name': name },
        });
    }
}
