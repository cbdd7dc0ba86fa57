import { EncodingError } from '@src/domain/exceptions/DataAccessError';
import { KeyBuilder } from '@src/infrastructure/persistence/dynamodb/engine/KeyBuilder';

describe('KeyBuilder', () => {
    const keys = new KeyBuilder();

    it('should build a simple id key', () => {
        expect(keys.simpleKey('p1')).toEqual({ id: { S: 'p1' } });
    });

    it('should honour a custom partition key name', () => {
        expect(new KeyBuilder('sku').simpleKey('A-1')).toEqual({ sku: { S: 'A-1' } });
    });

    it('should build a composite key from strings and numbers', () => {
        expect(keys.compositeKey('tenantId', 'seq', 't1', 42)).toEqual({
            tenantId: { S: 't1' },
            seq: { N: '42' },
        });
    });

    it.each([
        ['a boolean', true],
        ['an object', { nested: 1 }],
        ['NaN', Number.NaN],
        ['undefined', undefined],
    ])('should reject %s as a key value', (_label, value) => {
        expect(() => keys.compositeKey('pk', 'sk', 'a', value)).toThrow(EncodingError);
    });
});
