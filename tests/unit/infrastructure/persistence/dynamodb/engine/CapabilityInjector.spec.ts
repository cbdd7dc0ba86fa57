import { z } from 'zod';
import { Brand } from '@src/domain/entities/Brand';
import { productCodec } from '@src/infrastructure/persistence/dynamodb/codecs';
import { CapabilityInjector } from '@src/infrastructure/persistence/dynamodb/engine/CapabilityInjector';
import { EntityCodec } from '@src/infrastructure/persistence/dynamodb/engine/EntityCodec';
import { FakeClock, makeProduct, NOW } from '../../../../../helpers/fixtures';

const tagSchema = z.object({ id: z.string(), label: z.string() });
type Tag = z.infer<typeof tagSchema>;
const tagCodec = new EntityCodec({
    entityName: 'Tag',
    schema: tagSchema,
    toRecord: (tag: Tag) => tag,
    fromRecord: (record: Tag) => record,
});

describe('CapabilityInjector', () => {
    let clock: FakeClock;
    let injector: CapabilityInjector;

    beforeEach(() => {
        clock = new FakeClock();
        injector = new CapabilityInjector(clock);
    });

    describe('prepareForCreate()', () => {
        it('should stamp both instants with the same now and set version 1', () => {
            const product = makeProduct({ createdAt: 5, updatedAt: 6, version: 9 });

            injector.prepareForCreate(product);

            expect(product.createdAt).toBe(NOW);
            expect(product.updatedAt).toBe(NOW);
            expect(product.version).toBe(1);
        });

        it('should leave entities without capabilities untouched', () => {
            const tag = { id: 't1', label: 'sale' };

            injector.prepareForCreate(tag);

            expect(tag).toEqual({ id: 't1', label: 'sale' });
        });
    });

    describe('prepareForUpdate()', () => {
        it('should add updatedAt, the next version and a version guard', () => {
            const brand = new Brand('b1', 'Acme', 10, 10, 4);

            const stamps = injector.prepareForUpdate(brand, { name: 'Acme Corp' });

            expect(stamps).toEqual({
                assignments: { name: 'Acme Corp', updatedAt: NOW, version: 5 },
                increments: [],
                versionGuard: {
                    conditionExpression: '#version = :expectedVersion',
                    expressionAttributeNames: { '#version': 'version' },
                    expressionAttributeValues: { ':expectedVersion': 4 },
                },
            });
        });

        it('should also accept a missing stored version when the entity reads as version 0', () => {
            const stamps = injector.prepareForUpdate(makeProduct({ version: 0 }), { price: 1 });

            expect(stamps.assignments.version).toBe(1);
            expect(stamps.versionGuard).toEqual({
                conditionExpression: 'attribute_not_exists(#version) OR #version = :expectedVersion',
                expressionAttributeNames: { '#version': 'version' },
                expressionAttributeValues: { ':expectedVersion': 0 },
            });
        });

        it('should not mutate the entity', () => {
            const brand = new Brand('b1', 'Acme', 10, 10, 4);

            injector.prepareForUpdate(brand, { name: 'Acme Corp' });

            expect(brand).toEqual(new Brand('b1', 'Acme', 10, 10, 4));
        });

        it('should omit the guard when optimistic locking is off', () => {
            const stamps = injector.prepareForUpdate(makeProduct({ version: 2 }), { price: 1 }, false);

            expect(stamps.versionGuard).toBeUndefined();
            expect(stamps.assignments).toEqual({ price: 1, updatedAt: NOW, version: 3 });
        });

        it('should pass assignments through for plain entities', () => {
            const stamps = injector.prepareForUpdate({ id: 't1', label: 'sale' }, { label: 'clearance' });

            expect(stamps).toEqual({ assignments: { label: 'clearance' }, increments: [], versionGuard: undefined });
        });
    });

    describe('prepareForUpdateById()', () => {
        it('should stamp updatedAt and increment version in the store when the schema declares them', () => {
            const stamps = injector.prepareForUpdateById(productCodec, { price: 12, version: 40 });

            expect(stamps).toEqual({ assignments: { price: 12, updatedAt: NOW }, increments: ['version'] });
        });

        it('should leave assignments alone for schemas without those attributes', () => {
            const stamps = injector.prepareForUpdateById(tagCodec, { label: 'clearance' });

            expect(stamps).toEqual({ assignments: { label: 'clearance' }, increments: [] });
        });
    });
});
