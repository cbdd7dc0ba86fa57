import {
    DeleteItemCommand,
    DynamoDBClient,
    GetItemCommand,
    PutItemCommand,
    UpdateItemCommand,
} from '@aws-sdk/client-dynamodb';
import { ILogger } from '../../../../application/interfaces/ILogger';
import { ExpressionAttributes, Key } from '../../../../shared/types/query.types';
import { mapStoreError } from '../errors';
import { executeStoreCommand } from '../execute';
import { IEntityCodec } from './EntityCodec';
import { buildSetExpression, mergeAttributeMaps } from './expressions';

export interface WriteCondition extends ExpressionAttributes {
    conditionExpression: string;
}

export interface ItemUpdateOptions extends ExpressionAttributes {
    conditionExpression?: string;
    returnUpdated?: boolean;
    /** Numeric attributes incremented in place, starting from 0 when absent. */
    increments?: readonly string[];
}

/**
 * Single-item reads and writes against one table. No retries: every failure
 * reaches the caller as a typed error.
 */
export class ItemAccessor<T> {
    constructor(
        private readonly client: DynamoDBClient,
        private readonly tableName: string,
        private readonly codec: IEntityCodec<T>,
        private readonly logger: ILogger,
    ) { }

    /**
     * @returns the decoded entity, or `null` when no item has the key.
     */
    async get(key: Key, consistent = false): Promise<T | null> {
        const command = new GetItemCommand({
            TableName: this.tableName,
            Key: key,
            ...(consistent ? { ConsistentRead: true } : {}),
        });
        try {
            const result = await executeStoreCommand('GetItem', this.tableName, () => this.client.send(command));
            if (!result.Item) {
                this.logger.debug(`${this.codec.entityName} not found in ${this.tableName}`, { key });
                return null;
            }
            return this.codec.unmarshal(result.Item);
        } catch (error) {
            this.logger.error(`Error reading ${this.codec.entityName} from ${this.tableName}`, error, { key });
            throw mapStoreError(error, this.tableName, 'GetItem');
        }
    }

    async put(entity: T, condition?: WriteCondition): Promise<void> {
        const item = this.codec.marshal(entity);
        const command = new PutItemCommand({
            TableName: this.tableName,
            Item: item,
            ...this.conditionInput(condition),
        });
        try {
            await executeStoreCommand('PutItem', this.tableName, () => this.client.send(command));
        } catch (error) {
            this.logger.error(`Error writing ${this.codec.entityName} to ${this.tableName}`, error);
            throw mapStoreError(error, this.tableName, 'PutItem', condition?.conditionExpression);
        }
    }

    /**
     * Deleting a key that has no item succeeds unless a condition is supplied.
     */
    async delete(key: Key, condition?: WriteCondition): Promise<void> {
        const command = new DeleteItemCommand({
            TableName: this.tableName,
            Key: key,
            ...this.conditionInput(condition),
        });
        try {
            await executeStoreCommand('DeleteItem', this.tableName, () => this.client.send(command));
        } catch (error) {
            this.logger.error(`Error deleting ${this.codec.entityName} from ${this.tableName}`, error, { key });
            throw mapStoreError(error, this.tableName, 'DeleteItem', condition?.conditionExpression);
        }
    }

    async update(key: Key, assignments: Record<string, unknown>, options: ItemUpdateOptions = {}): Promise<T | null> {
        const set = buildSetExpression(assignments, options.increments);
        const names = mergeAttributeMaps(options.expressionAttributeNames, set.expressionAttributeNames);
        const values = mergeAttributeMaps(
            options.expressionAttributeValues ? this.codec.marshalValues(options.expressionAttributeValues) : undefined,
            set.expressionAttributeValues,
        );

        const command = new UpdateItemCommand({
            TableName: this.tableName,
            Key: key,
            UpdateExpression: set.updateExpression,
            ...(options.conditionExpression ? { ConditionExpression: options.conditionExpression } : {}),
            ...(names ? { ExpressionAttributeNames: names } : {}),
            ...(values ? { ExpressionAttributeValues: values } : {}),
            ReturnValues: options.returnUpdated ? 'ALL_NEW' : 'NONE',
        });

        try {
            const result = await executeStoreCommand('UpdateItem', this.tableName, () => this.client.send(command));
            if (!options.returnUpdated || !result.Attributes) {
                return null;
            }
            return this.codec.unmarshal(result.Attributes);
        } catch (error) {
            this.logger.error(`Error updating ${this.codec.entityName} in ${this.tableName}`, error, { key });
            throw mapStoreError(error, this.tableName, 'UpdateItem', options.conditionExpression);
        }
    }

    private conditionInput(condition?: WriteCondition) {
        if (!condition) {
            return {};
        }
        const values = condition.expressionAttributeValues ? this.codec.marshalValues(condition.expressionAttributeValues) : undefined;
        return {
            ConditionExpression: condition.conditionExpression,
            ...(condition.expressionAttributeNames ? { ExpressionAttributeNames: condition.expressionAttributeNames } : {}),
            ...(values ? { ExpressionAttributeValues: values } : {}),
        };
    }
}
