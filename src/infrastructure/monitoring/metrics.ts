import { Counter, Histogram, Registry } from 'prom-client';

export const registry = new Registry();

registry.setDefaultLabels({
  serviceName: 'catalog-data-access',
});

export type StoreCallOutcome = 'success' | 'condition_failed' | 'throttled' | 'error';

export const dynamoOperationCounter = new Counter({
  name: 'dynamodb_operations_total',
  help: 'Total number of DynamoDB requests',
  labelNames: ['operation', 'table', 'outcome'],
  registers: [registry],
});

// buckets from 1ms to 10s
export const dynamoOperationDuration = new Histogram({
  name: 'dynamodb_operation_duration_seconds',
  help: 'Duration of DynamoDB requests in seconds',
  labelNames: ['operation', 'table'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 10],
  registers: [registry],
});

export const batchUnprocessedItemsCounter = new Counter({
  name: 'dynamodb_batch_unprocessed_items_total',
  help: 'Items returned as unprocessed by BatchWriteItem',
  labelNames: ['table'],
  registers: [registry],
});
