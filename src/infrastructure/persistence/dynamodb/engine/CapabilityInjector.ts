import { isTimestamped, isVersioned } from '../../../../domain/entities/DynamoEntity';
import { APP_CONSTANTS } from '../../../../shared/constants';
import { Clock } from '../../../../shared/utils/clock';
import { IEntityCodec } from './EntityCodec';

const { CREATED_AT, UPDATED_AT } = APP_CONSTANTS.TIMESTAMP_ATTRIBUTES;
const VERSION = APP_CONSTANTS.VERSION_ATTRIBUTE;

export const VERSION_CONDITION = '#version = :expectedVersion';
/** Version 0 is also what an item stored without a version decodes to. */
export const INITIAL_VERSION_CONDITION = `attribute_not_exists(#version) OR ${VERSION_CONDITION}`;

export interface VersionGuard {
    conditionExpression: string;
    expressionAttributeNames: Record<string, string>;
    expressionAttributeValues: Record<string, unknown>;
}

export interface UpdateStamps {
    assignments: Record<string, unknown>;
    /** Attributes incremented in place with `if_not_exists(attr, 0) + 1`. */
    increments: string[];
    versionGuard?: VersionGuard;
}

/**
 * Applies the side effects of the optional Timestamped and Versioned contracts.
 * Detection is per instance and structural.
 */
export class CapabilityInjector {
    constructor(private readonly clock: Clock) { }

    /**
     * Stamps an entity about to be written in full. Creation and update instants
     * are both reset to now, including when the write overwrites an existing item.
     */
    prepareForCreate<T>(entity: T): void {
        if (isTimestamped(entity)) {
            const now = this.clock.now();
            entity.setCreatedAt(now);
            entity.setUpdatedAt(now);
        }
        if (isVersioned(entity)) {
            entity.setVersion(1);
        }
    }

    /**
     * Adds `updatedAt` and the next version to the caller's assignments without
     * touching the entity. The version guard is omitted when `optimisticLock` is false.
     */
    prepareForUpdate<T>(entity: T, assignments: Record<string, unknown>, optimisticLock = true): UpdateStamps {
        const stamped: Record<string, unknown> = { ...assignments };
        let versionGuard: VersionGuard | undefined;

        if (isTimestamped(entity)) {
            stamped[UPDATED_AT] = this.clock.now();
        }
        if (isVersioned(entity)) {
            const current = entity.getVersion();
            stamped[VERSION] = current + 1;
            if (optimisticLock) {
                versionGuard = {
                    conditionExpression: current === 0 ? INITIAL_VERSION_CONDITION : VERSION_CONDITION,
                    expressionAttributeNames: { '#version': VERSION },
                    expressionAttributeValues: { ':expectedVersion': current },
                };
            }
        }

        return { assignments: stamped, increments: [], versionGuard };
    }

    /**
     * Stamps an update addressed by id alone, based on the attributes the entity
     * schema declares. The version is incremented in the store.
     */
    prepareForUpdateById<T>(codec: IEntityCodec<T>, assignments: Record<string, unknown>): UpdateStamps {
        const stamped: Record<string, unknown> = { ...assignments };
        const increments: string[] = [];

        if (codec.hasAttribute(UPDATED_AT) && codec.hasAttribute(CREATED_AT)) {
            stamped[UPDATED_AT] = this.clock.now();
        }
        if (codec.hasAttribute(VERSION)) {
            delete stamped[VERSION];
            increments.push(VERSION);
        }

        return { assignments: stamped, increments };
    }
}
