/**
 * Contract every stored entity satisfies: a stable identifier the partition key is derived from.
 */
export interface DynamoEntity {
    readonly id: string;
}

/**
 * Optional capability: creation and last-update instants, in Unix seconds.
 */
export interface TimestampedEntity {
    getCreatedAt(): number;
    setCreatedAt(timestamp: number): void;
    getUpdatedAt(): number;
    setUpdatedAt(timestamp: number): void;
}

/**
 * Optional capability: version number used for optimistic concurrency.
 */
export interface VersionedEntity {
    getVersion(): number;
    setVersion(version: number): void;
}

function hasMethods(value: unknown, methods: readonly string[]): boolean {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return methods.every(method => typeof Reflect.get(value, method) === 'function');
}

export function isTimestamped<T>(entity: T): entity is T & TimestampedEntity {
    return hasMethods(entity, ['getCreatedAt', 'setCreatedAt', 'getUpdatedAt', 'setUpdatedAt']);
}

export function isVersioned<T>(entity: T): entity is T & VersionedEntity {
    return hasMethods(entity, ['getVersion', 'setVersion']);
}
