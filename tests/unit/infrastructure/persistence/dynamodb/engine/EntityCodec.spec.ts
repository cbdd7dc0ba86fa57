import { z } from 'zod';
import { Product } from '@src/domain/entities/Product';
import { DecodingError, EncodingError } from '@src/domain/exceptions/DataAccessError';
import { productCodec } from '@src/infrastructure/persistence/dynamodb/codecs';
import { EntityCodec } from '@src/infrastructure/persistence/dynamodb/engine/EntityCodec';
import { makeProduct } from '../../../../../helpers/fixtures';

const settingSchema = z.object({
    id: z.string(),
    value: z.unknown(),
});
type SettingRecord = z.infer<typeof settingSchema>;

const settingCodec = new EntityCodec({
    entityName: 'Setting',
    schema: settingSchema,
    toRecord: (setting: SettingRecord) => setting,
    fromRecord: (record: SettingRecord) => record,
});

describe('EntityCodec', () => {
    describe('marshal()', () => {
        it('should tag scalars, lists and maps', () => {
            const product = makeProduct({
                description: 'A small widget',
                imageUrls: [{ url: 'https://cdn.test/w.png', alt: 'front' }],
                createdAt: 100,
                updatedAt: 200,
                version: 2,
            });

            expect(productCodec.marshal(product)).toEqual({
                id: { S: 'p1' },
                name: { S: 'Widget' },
                price: { N: '9.99' },
                description: { S: 'A small widget' },
                imageUrls: { L: [{ M: { url: { S: 'https://cdn.test/w.png' }, alt: { S: 'front' } } }] },
                createdAt: { N: '100' },
                updatedAt: { N: '200' },
                version: { N: '2' },
            });
        });

        it('should omit undefined optional fields', () => {
            const item = productCodec.marshal(makeProduct());

            expect(Object.keys(item).sort()).toEqual(['createdAt', 'id', 'imageUrls', 'name', 'price', 'updatedAt', 'version']);
        });

        it('should encode booleans, null and nested maps', () => {
            const item = settingCodec.marshal({ id: 's1', value: { enabled: true, limit: null, tags: ['a'] } });

            expect(item.value).toEqual({
                M: { enabled: { BOOL: true }, limit: { NULL: true }, tags: { L: [{ S: 'a' }] } },
            });
        });

        it.each([
            ['NaN', Number.NaN],
            ['Infinity', Number.POSITIVE_INFINITY],
            ['an integer beyond 2^53', 2 ** 60],
        ])('should throw EncodingError for %s', (_label, price) => {
            expect(() => productCodec.marshal(makeProduct({ price }))).toThrow(EncodingError);
        });
    });

    describe('unmarshal()', () => {
        it('should round-trip a product', () => {
            const product = makeProduct({
                description: 'A small widget',
                status: 'ACTIVE',
                brandId: 'b1',
                categoryId: 'c1',
                imageUrls: [{ url: 'https://cdn.test/w.png', alt: 'front' }],
                createdAt: 100,
                updatedAt: 200,
                version: 3,
            });

            const decoded = productCodec.unmarshal(productCodec.marshal(product));

            expect(decoded).toBeInstanceOf(Product);
            expect(decoded).toEqual(product);
        });

        it('should round-trip nested values of an arbitrary schema', () => {
            const setting = { id: 's1', value: { levels: [1, 2.5, -3], label: 'ünïcødé', nested: { deep: [true, null] } } };

            expect(settingCodec.unmarshal(settingCodec.marshal(setting))).toEqual(setting);
        });

        it('should default injected fields absent from the stored item', () => {
            const decoded = productCodec.unmarshal({ id: { S: 'p1' }, name: { S: 'Widget' }, price: { N: '9.99' } });

            expect(decoded.createdAt).toBe(0);
            expect(decoded.updatedAt).toBe(0);
            expect(decoded.version).toBe(0);
            expect(decoded.imageUrls).toEqual([]);
        });

        it('should throw DecodingError listing a missing required field', () => {
            const attempt = () => productCodec.unmarshal({ id: { S: 'p1' }, price: { N: '1' } });

            expect(attempt).toThrow(DecodingError);
            try {
                attempt();
            } catch (error) {
                expect(error).toBeInstanceOf(DecodingError);
                if (error instanceof DecodingError) {
                    expect(error.issues).toEqual(['name: Required']);
                    expect(error.code).toBe('DECODING_ERROR');
                }
            }
        });

        it('should throw DecodingError on a type mismatch', () => {
            expect(() => productCodec.unmarshal({ id: { S: 'p1' }, name: { S: 'Widget' }, price: { S: 'cheap' } }))
                .toThrow(DecodingError);
        });

        it('should throw DecodingError for a number outside the safe range', () => {
            expect(() => productCodec.unmarshal({ id: { S: 'p1' }, name: { S: 'Widget' }, price: { N: '123456789012345678901' } }))
                .toThrow(DecodingError);
        });
    });

    describe('marshalValue()', () => {
        it('should marshal scalars for expression values', () => {
            expect(productCodec.marshalValue('c1')).toEqual({ S: 'c1' });
            expect(productCodec.marshalValue(7)).toEqual({ N: '7' });
            expect(productCodec.marshalValue(false)).toEqual({ BOOL: false });
        });

        it('should throw EncodingError for non-finite numbers', () => {
            expect(() => productCodec.marshalValue(Number.NaN)).toThrow(EncodingError);
        });

        it('should marshal every entry of a placeholder map', () => {
            expect(productCodec.marshalValues({ ':brandId': 'b1', ':min': 5 })).toEqual({
                ':brandId': { S: 'b1' },
                ':min': { N: '5' },
            });
        });
    });

    describe('hasAttribute()', () => {
        it('should report attributes declared by the schema', () => {
            expect(productCodec.hasAttribute('updatedAt')).toBe(true);
            expect(productCodec.hasAttribute('version')).toBe(true);
            expect(productCodec.hasAttribute('sku')).toBe(false);
            expect(settingCodec.hasAttribute('version')).toBe(false);
        });
    });
});
