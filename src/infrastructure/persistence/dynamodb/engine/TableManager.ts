import {
    AttributeDefinition,
    BillingMode,
    CreateTableCommand,
    CreateTableCommandInput,
    DeleteTableCommand,
    DescribeTableCommand,
    GlobalSecondaryIndex,
    KeySchemaElement,
    LocalSecondaryIndex,
    Projection,
    ScalarAttributeType,
    TableStatus,
} from '@aws-sdk/client-dynamodb';
import { inject, injectable } from 'tsyringe';
import { ILogger } from '../../../../application/interfaces/ILogger';
import { OperationCancelledError, TableUnavailableError } from '../../../../domain/exceptions/DataAccessError';
import { APP_CONSTANTS } from '../../../../shared/constants';
import { TYPES } from '../../../../shared/constants/types';
import { ValidationError } from '../../../../shared/errors/BaseError';
import { Clock } from '../../../../shared/utils/clock';
import { DataAccessSettings } from '../../../config/dataAccessSettings';
import { DynamoDBProvider } from '../dynamodb.client';
import { errorMessage, isAbortError, isResourceInUse, isResourceNotFound, mapStoreError, throwIfAborted } from '../errors';
import { executeStoreCommand } from '../execute';

export interface KeyAttribute {
    name: string;
    type: ScalarAttributeType;
}

export interface ProvisionedThroughputDefinition {
    readCapacityUnits: number;
    writeCapacityUnits: number;
}

export interface SecondaryIndexDefinition {
    indexName: string;
    partitionKey: KeyAttribute;
    sortKey?: KeyAttribute;
    /** Defaults to ALL. */
    projection?: Projection;
    provisionedThroughput?: ProvisionedThroughputDefinition;
}

export interface TableDefinition {
    tableName: string;
    /** Defaults to `id` of type `S`. */
    partitionKey?: KeyAttribute;
    sortKey?: KeyAttribute;
    /** Defaults to PAY_PER_REQUEST; PROVISIONED requires `provisionedThroughput`. */
    billingMode?: BillingMode;
    provisionedThroughput?: ProvisionedThroughputDefinition;
    globalSecondaryIndexes?: SecondaryIndexDefinition[];
    /** Requires a table sort key. */
    localSecondaryIndexes?: LocalSecondaryIndexDefinition[];
}

/** Local indexes share the table's partition key; only their sort key differs. */
export interface LocalSecondaryIndexDefinition {
    indexName: string;
    sortKey: KeyAttribute;
    /** Defaults to ALL. */
    projection?: Projection;
}

const DEFAULT_PARTITION_KEY: KeyAttribute = { name: APP_CONSTANTS.PARTITION_KEY, type: 'S' };

/**
 * Creates tables on demand and blocks until they are ACTIVE.
 */
@injectable()
export class TableManager {
    constructor(
        @inject(TYPES.DynamoDBProvider) private readonly provider: DynamoDBProvider,
        @inject(TYPES.Logger) private readonly logger: ILogger,
        @inject(TYPES.DataAccessSettings) private readonly settings: DataAccessSettings,
        @inject(TYPES.Clock) private readonly clock: Clock,
    ) { }

    /**
     * @returns false only when the store reports the table missing.
     * @throws {TableUnavailableError} for any other DescribeTable failure.
     */
    async tableExists(tableName: string): Promise<boolean> {
        try {
            await this.describe(tableName);
            return true;
        } catch (error) {
            if (isResourceNotFound(error)) {
                return false;
            }
            this.logger.error(`Error checking table ${tableName}`, error);
            throw new TableUnavailableError(tableName, errorMessage(error), error);
        }
    }

    /**
     * Creating a table that already exists counts as success. Resolves once the table is ACTIVE.
     */
    async createTable(definition: TableDefinition, signal?: AbortSignal): Promise<void> {
        const { tableName } = definition;
        throwIfAborted(signal, 'CreateTable');
        try {
            await executeStoreCommand('CreateTable', tableName, () =>
                this.provider.client.send(new CreateTableCommand(buildCreateTableInput(definition))),
            );
            this.logger.info(`Table ${tableName} created, waiting for it to become ACTIVE`);
        } catch (error) {
            if (!isResourceInUse(error)) {
                this.logger.error(`Error creating table ${tableName}`, error);
                throw new TableUnavailableError(tableName, errorMessage(error), error);
            }
            this.logger.info(`Table ${tableName} already exists`);
        }
        await this.waitForActive(tableName, signal);
    }

    /**
     * Makes sure the table exists and is ACTIVE, creating it when missing.
     */
    async ensureTable(definition: TableDefinition, signal?: AbortSignal): Promise<void> {
        if (await this.tableExists(definition.tableName)) {
            await this.waitForActive(definition.tableName, signal);
            return;
        }
        await this.createTable(definition, signal);
    }

    /**
     * Polls DescribeTable until the table is ACTIVE.
     * @throws {TableUnavailableError} once `tableCreationTimeoutMs` has elapsed.
     * @throws {OperationCancelledError} when `signal` fires.
     */
    async waitForActive(tableName: string, signal?: AbortSignal): Promise<void> {
        const { tableCreationTimeoutMs, tableActivePollIntervalMs } = this.settings;
        const deadline = this.clock.elapsedMs() + tableCreationTimeoutMs;

        for (;;) {
            throwIfAborted(signal, 'WaitForTableActive');
            const status = await this.currentStatus(tableName);
            if (status === 'ACTIVE') {
                this.logger.info(`Table ${tableName} is ACTIVE`);
                return;
            }

            const remaining = deadline - this.clock.elapsedMs();
            if (remaining <= 0) {
                throw new TableUnavailableError(
                    tableName,
                    `did not become ACTIVE within ${tableCreationTimeoutMs}ms (last status: ${status ?? 'NOT_FOUND'})`,
                );
            }
            this.logger.debug(`Table ${tableName} is ${status ?? 'not visible yet'}, polling again`);
            await this.pause(Math.min(tableActivePollIntervalMs, remaining), signal);
        }
    }

    /**
     * Deleting a missing table is a no-op.
     */
    async deleteTable(tableName: string): Promise<void> {
        try {
            await executeStoreCommand('DeleteTable', tableName, () =>
                this.provider.client.send(new DeleteTableCommand({ TableName: tableName })),
            );
            this.logger.info(`Table ${tableName} deleted`);
        } catch (error) {
            if (isResourceNotFound(error)) {
                return;
            }
            this.logger.error(`Error deleting table ${tableName}`, error);
            throw mapStoreError(error, tableName, 'DeleteTable');
        }
    }

    private async describe(tableName: string) {
        return executeStoreCommand('DescribeTable', tableName, () =>
            this.provider.client.send(new DescribeTableCommand({ TableName: tableName })),
        );
    }

    // Right after CreateTable the table may not be visible yet
    private async currentStatus(tableName: string): Promise<TableStatus | undefined> {
        try {
            const result = await this.describe(tableName);
            return result.Table?.TableStatus;
        } catch (error) {
            if (isResourceNotFound(error)) {
                return undefined;
            }
            this.logger.error(`Error waiting for table ${tableName}`, error);
            throw new TableUnavailableError(tableName, errorMessage(error), error);
        }
    }

    private async pause(ms: number, signal?: AbortSignal): Promise<void> {
        try {
            await this.clock.sleep(ms, signal);
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) {
                throw new OperationCancelledError('WaitForTableActive', error);
            }
            throw error;
        }
    }
}

export function buildCreateTableInput(definition: TableDefinition): CreateTableCommandInput {
    if (definition.localSecondaryIndexes?.length && !definition.sortKey) {
        throw new ValidationError(`Table '${definition.tableName}' needs a sort key to have local secondary indexes`);
    }
    const partitionKey = definition.partitionKey ?? DEFAULT_PARTITION_KEY;
    const billingMode = definition.billingMode ?? 'PAY_PER_REQUEST';
    const attributes = new Map<string, ScalarAttributeType>();

    const keySchema = (pk: KeyAttribute, sk?: KeyAttribute): KeySchemaElement[] => {
        attributes.set(pk.name, pk.type);
        const schema: KeySchemaElement[] = [{ AttributeName: pk.name, KeyType: 'HASH' }];
        if (sk) {
            attributes.set(sk.name, sk.type);
            schema.push({ AttributeName: sk.name, KeyType: 'RANGE' });
        }
        return schema;
    };

    const throughput = (value?: ProvisionedThroughputDefinition) =>
        billingMode === 'PROVISIONED' && value
            ? { ProvisionedThroughput: { ReadCapacityUnits: value.readCapacityUnits, WriteCapacityUnits: value.writeCapacityUnits } }
            : {};

    const tableKeySchema = keySchema(partitionKey, definition.sortKey);

    const globalIndexes: GlobalSecondaryIndex[] = (definition.globalSecondaryIndexes ?? []).map((index): GlobalSecondaryIndex => ({
        IndexName: index.indexName,
        KeySchema: keySchema(index.partitionKey, index.sortKey),
        Projection: index.projection ?? { ProjectionType: 'ALL' },
        ...throughput(index.provisionedThroughput ?? definition.provisionedThroughput),
    }));

    const localIndexes: LocalSecondaryIndex[] = (definition.localSecondaryIndexes ?? []).map((index): LocalSecondaryIndex => ({
        IndexName: index.indexName,
        KeySchema: keySchema(partitionKey, index.sortKey),
        Projection: index.projection ?? { ProjectionType: 'ALL' },
    }));

    const attributeDefinitions: AttributeDefinition[] = [...attributes].map(([name, type]): AttributeDefinition => ({
        AttributeName: name,
        AttributeType: type,
    }));

    return {
        TableName: definition.tableName,
        KeySchema: tableKeySchema,
        AttributeDefinitions: attributeDefinitions,
        BillingMode: billingMode,
        ...throughput(definition.provisionedThroughput),
        ...(globalIndexes.length > 0 ? { GlobalSecondaryIndexes: globalIndexes } : {}),
        ...(localIndexes.length > 0 ? { LocalSecondaryIndexes: localIndexes } : {}),
    };
}
