import { Product, ProductSummary } from '../../domain/entities/Product';
import { IRepository } from './IRepository';

/**
 * Product finders scan the whole table and return summaries
 * (id, name, status, categoryId, brandId), not full products.
 */
export interface IProductRepository extends IRepository<Product> {
    findByCategory(categoryId: string): Promise<ProductSummary[]>;
    findByBrand(brandId: string): Promise<ProductSummary[]>;
    /** Case-sensitive substring match on the name. */
    searchByName(name: string): Promise<ProductSummary[]>;
}
