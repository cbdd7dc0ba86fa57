import { AttributeValue } from '@aws-sdk/client-dynamodb';
import { AttributeMap } from '../../shared/types/query.types';

/**
 * Converts between one entity type and the store's attribute-value representation.
 */
export interface IEntityCodec<T> {
    readonly entityName: string;
    marshal(entity: T): AttributeMap;
    unmarshal(item: AttributeMap): T;
    /** Marshals a single value, as used by keys and expression attribute values. */
    marshalValue(value: unknown): AttributeValue;
    marshalValues(values: Record<string, unknown>): Record<string, AttributeValue>;
    /** Whether the entity's schema declares the attribute. */
    hasAttribute(name: string): boolean;
}
