import { inject, injectable } from 'tsyringe';
import { ILogger } from '../../../application/interfaces/ILogger';
import { IProductRepository } from '../../../application/interfaces/IProductRepository';
import { PRODUCT_SUMMARY_ATTRIBUTES, Product, ProductSummary } from '../../../domain/entities/Product';
import { TYPES } from '../../../shared/constants/types';
import { Clock } from '../../../shared/utils/clock';
import { DataAccessSettings } from '../../config/dataAccessSettings';
import { productCodec, productSummaryCodec } from './codecs';
import { DynamoBaseRepository } from './DynamoBaseRepository';
import { DynamoDBProvider } from './dynamodb.client';
import { buildProjection } from './engine/expressions';

const SUMMARY_PROJECTION = buildProjection(PRODUCT_SUMMARY_ATTRIBUTES);

/**
 * The finders below scan the full table with a filter, so their cost is
 * proportional to the number of products stored, not to the matches.
 */
@injectable()
export class DynamoProductRepository extends DynamoBaseRepository<Product> implements IProductRepository {
    constructor(
        @inject(TYPES.DynamoDBProvider) provider: DynamoDBProvider,
        @inject(TYPES.Logger) logger: ILogger,
        @inject(TYPES.DataAccessSettings) settings: DataAccessSettings,
        @inject(TYPES.Clock) clock: Clock,
    ) {
        super(settings.tableNames.products, productCodec, { client: provider.client, logger, settings, clock });
    }

    async findByCategory(categoryId: string): Promise<ProductSummary[]> {
        return this.scanSummaries('#categoryId = :categoryId', { '#categoryId': 'categoryId' }, { ':categoryId': categoryId });
    }

    async findByBrand(brandId: string): Promise<ProductSummary[]> {
        return this.scanSummaries('#brandId = :brandId', { '#brandId': 'brandId' }, { ':brandId': brandId });
    }

    async searchByName(name: string): Promise<ProductSummary[]> {
        return this.scanSummaries('contains(#name, :name)', { '#name': 'name' }, { ':name': name });
    }

    private async scanSummaries(
        filterExpression: string,
        names: Record<string, string>,
        values: Record<string, unknown>,
    ): Promise<ProductSummary[]> {
        return this.scanAs(productSummaryCodec, {
            filterExpression,
            projectionExpression: SUMMARY_PROJECTION.projectionExpression,
            expressionAttributeNames: { ...names, ...SUMMARY_PROJECTION.expressionAttributeNames },
            expressionAttributeValues: values,
        });
    }
}
