import { EncodingError } from '../../../../domain/exceptions/DataAccessError';
import { APP_CONSTANTS } from '../../../../shared/constants';
import { Key } from '../../../../shared/types/query.types';
import { marshalValue } from './EntityCodec';

export type KeyValue = string | number;

export class KeyBuilder {
    constructor(private readonly partitionKeyName: string = APP_CONSTANTS.PARTITION_KEY) { }

    simpleKey(id: string): Key {
        return { [this.partitionKeyName]: { S: id } };
    }

    compositeKey(partitionName: string, sortName: string, partitionValue: unknown, sortValue: unknown): Key {
        return {
            [partitionName]: marshalValue(assertKeyValue(partitionName, partitionValue)),
            [sortName]: marshalValue(assertKeyValue(sortName, sortValue)),
        };
    }
}

function assertKeyValue(name: string, value: unknown): KeyValue {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    throw new EncodingError(`Key attribute '${name}' must be a string or a finite number, got ${typeof value}`);
}
