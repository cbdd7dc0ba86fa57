import { z } from 'zod';
import { DynamoEntity, TimestampedEntity, VersionedEntity } from './DynamoEntity';

export const brandSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    createdAt: z.number().int().default(0),
    updatedAt: z.number().int().default(0),
    version: z.number().int().nonnegative().default(0),
});
export type BrandRecord = z.infer<typeof brandSchema>;

/**
 * Manufacturer or label a product is sold under.
 */
export class Brand implements DynamoEntity, TimestampedEntity, VersionedEntity {
    constructor(
        public readonly id: string,
        public name: string,
        public createdAt: number = 0,
        public updatedAt: number = 0,
        public version: number = 0,
    ) {}

    getCreatedAt(): number { return this.createdAt; }
    setCreatedAt(timestamp: number): void { this.createdAt = timestamp; }
    getUpdatedAt(): number { return this.updatedAt; }
    setUpdatedAt(timestamp: number): void { this.updatedAt = timestamp; }

    getVersion(): number { return this.version; }
    setVersion(version: number): void { this.version = version; }

    public static fromPersistence(data: BrandRecord): Brand {
        return new Brand(data.id, data.name, data.createdAt, data.updatedAt, data.version);
    }

    public toPersistence(): BrandRecord {
        return {
            id: this.id,
            name: this.name,
            createdAt: this.createdAt,
            updatedAt: this.updatedAt,
            version: this.version,
        };
    }
}
