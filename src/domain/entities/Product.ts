import { z } from 'zod';
import { DynamoEntity, TimestampedEntity, VersionedEntity } from './DynamoEntity';

export const imageUrlSchema = z.object({
    url: z.string(),
    alt: z.string(),
});
export type ImageUrl = z.infer<typeof imageUrlSchema>;

/**
 * Persisted shape of a product. Only `id`, `name` and `price` are required;
 * injected fields default to zero when an item was written without them.
 */
export const productSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    price: z.number(),
    description: z.string().optional(),
    status: z.string().optional(),
    brandId: z.string().optional(),
    categoryId: z.string().optional(),
    imageUrls: z.array(imageUrlSchema).default([]),
    createdAt: z.number().int().default(0),
    updatedAt: z.number().int().default(0),
    version: z.number().int().nonnegative().default(0),
});
export type ProductRecord = z.infer<typeof productSchema>;

export type ProductProps = Pick<ProductRecord, 'id' | 'name' | 'price'> & Partial<ProductRecord>;

/**
 * A sellable catalog item. Carries its own timestamps and version, so saves and
 * updates stamp it automatically.
 */
export class Product implements DynamoEntity, TimestampedEntity, VersionedEntity {
    public readonly id: string;
    public name: string;
    public price: number;
    public description?: string;
    public status?: string;
    public brandId?: string;
    public categoryId?: string;
    public imageUrls: ImageUrl[];
    public createdAt: number;
    public updatedAt: number;
    public version: number;

    constructor(props: ProductProps) {
        this.id = props.id;
        this.name = props.name;
        this.price = props.price;
        this.description = props.description;
        this.status = props.status;
        this.brandId = props.brandId;
        this.categoryId = props.categoryId;
        this.imageUrls = props.imageUrls ?? [];
        this.createdAt = props.createdAt ?? 0;
        this.updatedAt = props.updatedAt ?? 0;
        this.version = props.version ?? 0;
    }

    getCreatedAt(): number { return this.createdAt; }
    setCreatedAt(timestamp: number): void { this.createdAt = timestamp; }
    getUpdatedAt(): number { return this.updatedAt; }
    setUpdatedAt(timestamp: number): void { this.updatedAt = timestamp; }

    getVersion(): number { return this.version; }
    setVersion(version: number): void { this.version = version; }

    public static fromPersistence(data: ProductRecord): Product {
        return new Product(data);
    }

    public toPersistence(): ProductRecord {
        return {
            id: this.id,
            name: this.name,
            price: this.price,
            description: this.description,
            status: this.status,
            brandId: this.brandId,
            categoryId: this.categoryId,
            imageUrls: this.imageUrls.map(image => ({ url: image.url, alt: image.alt })),
            createdAt: this.createdAt,
            updatedAt: this.updatedAt,
            version: this.version,
        };
    }
}

/**
 * Attributes returned by the product finders, which project away price,
 * description and images.
 */
export const productSummarySchema = productSchema.pick({
    id: true,
    name: true,
    status: true,
    categoryId: true,
    brandId: true,
});
export type ProductSummary = z.infer<typeof productSummarySchema>;

export const PRODUCT_SUMMARY_ATTRIBUTES: readonly (keyof ProductSummary)[] = ['id', 'name', 'status', 'categoryId', 'brandId'];
