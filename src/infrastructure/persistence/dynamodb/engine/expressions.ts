import { AttributeValue } from '@aws-sdk/client-dynamodb';
import { EncodingError } from '../../../../domain/exceptions/DataAccessError';
import { ValidationError } from '../../../../shared/errors/BaseError';
import { errorMessage } from '../errors';

export interface SetExpression {
    updateExpression: string;
    expressionAttributeNames: Record<string, string>;
    expressionAttributeValues: Record<string, AttributeValue>;
}

export interface ProjectionExpression {
    projectionExpression: string;
    expressionAttributeNames: Record<string, string>;
}

/**
 * Wire form of a SET value: numbers and bigints as `N`, anything else as its text.
 * Objects and arrays are written as their JSON text.
 */
export function toSetValue(attribute: string, value: unknown): AttributeValue {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new EncodingError(`Attribute '${attribute}' cannot be set to ${value}`);
        }
        return { N: String(value) };
    }
    if (typeof value === 'bigint') {
        return { N: value.toString() };
    }
    if (typeof value === 'string') {
        return { S: value };
    }
    if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
        throw new EncodingError(`Attribute '${attribute}' has no stored form (${typeof value})`);
    }
    if (typeof value === 'object' && value !== null) {
        try {
            return { S: JSON.stringify(value) };
        } catch (error) {
            throw new EncodingError(`Attribute '${attribute}' cannot be serialized: ${errorMessage(error)}`, error);
        }
    }
    return { S: String(value) };
}

/**
 * Builds `SET #set0 = :set0, ...` for the assignments, followed by
 * `#inc0 = if_not_exists(#inc0, :incZero) + :incOne` for each incremented counter.
 */
export function buildSetExpression(assignments: Record<string, unknown>, increments: readonly string[] = []): SetExpression {
    const clauses: string[] = [];
    const expressionAttributeNames: Record<string, string> = {};
    const expressionAttributeValues: Record<string, AttributeValue> = {};

    Object.entries(assignments).forEach(([attribute, value], index) => {
        const name = `#set${index}`;
        const placeholder = `:set${index}`;
        clauses.push(`${name} = ${placeholder}`);
        expressionAttributeNames[name] = attribute;
        expressionAttributeValues[placeholder] = toSetValue(attribute, value);
    });

    increments.forEach((attribute, index) => {
        const name = `#inc${index}`;
        clauses.push(`${name} = if_not_exists(${name}, :incZero) + :incOne`);
        expressionAttributeNames[name] = attribute;
    });
    if (increments.length > 0) {
        expressionAttributeValues[':incZero'] = { N: '0' };
        expressionAttributeValues[':incOne'] = { N: '1' };
    }

    if (clauses.length === 0) {
        throw new ValidationError('Update requires at least one attribute to set');
    }

    return {
        updateExpression: `SET ${clauses.join(', ')}`,
        expressionAttributeNames,
        expressionAttributeValues,
    };
}

export function buildProjection(attributes: readonly string[]): ProjectionExpression {
    const expressionAttributeNames: Record<string, string> = {};
    const names = attributes.map((attribute, index) => {
        const name = `#proj${index}`;
        expressionAttributeNames[name] = attribute;
        return name;
    });
    return {
        projectionExpression: names.join(', '),
        expressionAttributeNames,
    };
}

/**
 * Merges placeholder maps left to right. Returns undefined when nothing is left,
 * since the store rejects empty maps.
 */
export function mergeAttributeMaps<V>(...maps: (Record<string, V> | undefined)[]): Record<string, V> | undefined {
    const merged: Record<string, V> = {};
    for (const map of maps) {
        if (map) {
            Object.assign(merged, map);
        }
    }
    return Object.keys(merged).length > 0 ? merged : undefined;
}
