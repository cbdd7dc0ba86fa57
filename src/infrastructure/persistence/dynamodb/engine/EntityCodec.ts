import { AttributeValue } from '@aws-sdk/client-dynamodb';
import { convertToAttr, marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import { z } from 'zod';
import { IEntityCodec } from '../../../../application/interfaces/IEntityCodec';
import { DecodingError, EncodingError } from '../../../../domain/exceptions/DataAccessError';
import { AttributeMap } from '../../../../shared/types/query.types';
import { errorMessage } from '../errors';

const MARSHALL_OPTIONS = { removeUndefinedValues: true } as const;

export type { IEntityCodec };

export interface EntityCodecOptions<T, R extends Record<string, unknown>> {
    entityName: string;
    /** Validates stored items; object schemas also supply the declared attribute names. */
    schema: z.ZodType<R, z.ZodTypeDef, unknown>;
    toRecord(entity: T): R;
    fromRecord(record: R): T;
}

export function marshalValue(value: unknown): AttributeValue {
    try {
        return convertToAttr(value, MARSHALL_OPTIONS);
    } catch (error) {
        throw new EncodingError(`Value cannot be stored: ${errorMessage(error)}`, error);
    }
}

export function marshalValues(values: Record<string, unknown>): Record<string, AttributeValue> {
    const result: Record<string, AttributeValue> = {};
    for (const [placeholder, value] of Object.entries(values)) {
        result[placeholder] = marshalValue(value);
    }
    return result;
}

/**
 * Schema-backed codec: the entity is flattened to its persistence record, validated
 * against the zod schema on the way back, and rebuilt through `fromRecord`.
 */
export class EntityCodec<T, R extends Record<string, unknown>> implements IEntityCodec<T> {
    public readonly entityName: string;
    private readonly schema: z.ZodType<R, z.ZodTypeDef, unknown>;
    private readonly toRecord: (entity: T) => R;
    private readonly fromRecord: (record: R) => T;
    private readonly attributeNames: ReadonlySet<string>;

    constructor(options: EntityCodecOptions<T, R>) {
        this.entityName = options.entityName;
        this.schema = options.schema;
        this.toRecord = options.toRecord;
        this.fromRecord = options.fromRecord;
        this.attributeNames = new Set(options.schema instanceof z.ZodObject ? Object.keys(options.schema.shape) : []);
    }

    marshal(entity: T): AttributeMap {
        const record: Record<string, unknown> = this.toRecord(entity);
        try {
            const item: AttributeMap = marshall(record, MARSHALL_OPTIONS);
            return item;
        } catch (error) {
            throw new EncodingError(`${this.entityName} cannot be stored: ${errorMessage(error)}`, error);
        }
    }

    unmarshal(item: AttributeMap): T {
        let raw: Record<string, unknown>;
        try {
            raw = unmarshall(item);
        } catch (error) {
            throw new DecodingError(`Stored ${this.entityName} is not readable: ${errorMessage(error)}`, [], error);
        }

        const parsed = this.schema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new DecodingError(`Stored ${this.entityName} does not match its schema`, issues, parsed.error);
        }
        return this.fromRecord(parsed.data);
    }

    marshalValue(value: unknown): AttributeValue {
        return marshalValue(value);
    }

    marshalValues(values: Record<string, unknown>): Record<string, AttributeValue> {
        return marshalValues(values);
    }

    hasAttribute(name: string): boolean {
        return this.attributeNames.has(name);
    }
}
