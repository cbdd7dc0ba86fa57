import { Brand, brandSchema } from '../../../domain/entities/Brand';
import { Category, categorySchema } from '../../../domain/entities/Category';
import { Product, ProductSummary, productSchema, productSummarySchema } from '../../../domain/entities/Product';
import { EntityCodec } from './engine/EntityCodec';

export const productCodec = new EntityCodec({
    entityName: 'Product',
    schema: productSchema,
    toRecord: (product: Product) => product.toPersistence(),
    fromRecord: Product.fromPersistence,
});

/** Decodes the projected items returned by the product finders. */
export const productSummaryCodec = new EntityCodec({
    entityName: 'ProductSummary',
    schema: productSummarySchema,
    toRecord: (summary: ProductSummary) => summary,
    fromRecord: (record: ProductSummary) => record,
});

export const brandCodec = new EntityCodec({
    entityName: 'Brand',
    schema: brandSchema,
    toRecord: (brand: Brand) => brand.toPersistence(),
    fromRecord: Brand.fromPersistence,
});

export const categoryCodec = new EntityCodec({
    entityName: 'Category',
    schema: categorySchema,
    toRecord: (category: Category) => category.toPersistence(),
    fromRecord: Category.fromPersistence,
});
