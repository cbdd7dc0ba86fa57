import { BatchWriteItemCommand, DynamoDBClient, WriteRequest } from '@aws-sdk/client-dynamodb';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';
import { Product } from '@src/domain/entities/Product';
import {
    EncodingError,
    OperationCancelledError,
    PartialBatchFailureError,
    StoreError,
    ThrottledError,
} from '@src/domain/exceptions/DataAccessError';
import { productCodec } from '@src/infrastructure/persistence/dynamodb/codecs';
import { BatchWriter } from '@src/infrastructure/persistence/dynamodb/engine/BatchWriter';
import { awsError, FakeClock, makeProduct } from '../../../../../helpers/fixtures';
import { createMockLogger } from '../../../../../mocks/logger.mock';

const ddbMock = mockClient(DynamoDBClient);
const TABLE = 'Products';

const products = (count: number): Product[] =>
    Array.from({ length: count }, (_, i) => makeProduct({ id: `p${i + 1}`, name: `Product ${i + 1}` }));

const requestsOf = (call: number): WriteRequest[] =>
    ddbMock.commandCalls(BatchWriteItemCommand)[call].args[0].input.RequestItems?.[TABLE] ?? [];

async function captureFailure(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('Expected the promise to reject');
}

describe('BatchWriter', () => {
    const logger = createMockLogger();
    let clock: FakeClock;
    let writer: BatchWriter<Product>;

    beforeEach(() => {
        ddbMock.reset();
        clock = new FakeClock();
        writer = new BatchWriter(
            new DynamoDBClient({ region: 'us-east-1' }),
            TABLE,
            productCodec,
            logger,
            { maxBatchSize: 25, maxAttempts: 3, baseDelayMs: 100 },
            clock,
        );
    });

    it('should send nothing for an empty write set', async () => {
        await expect(writer.writeAll([])).resolves.toEqual({ writtenCount: 0 });
        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 0);
    });

    it('should split 60 items into chunks of 25, 25 and 10', async () => {
        ddbMock.on(BatchWriteItemCommand).resolves({ UnprocessedItems: {} });

        await expect(writer.writeAll(products(60))).resolves.toEqual({ writtenCount: 60 });

        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 3);
        expect(requestsOf(0)).toHaveLength(25);
        expect(requestsOf(1)).toHaveLength(25);
        expect(requestsOf(2)).toHaveLength(10);
        expect(requestsOf(2)[9]).toEqual({ PutRequest: { Item: productCodec.marshal(makeProduct({ id: 'p60', name: 'Product 60' })) } });
        expect(clock.sleeps).toEqual([]);
    });

    it('should re-send only the unprocessed requests after backing off', async () => {
        const items = products(3);
        const leftover = [{ PutRequest: { Item: productCodec.marshal(items[2]) } }];
        ddbMock.on(BatchWriteItemCommand)
            .resolvesOnce({ UnprocessedItems: { [TABLE]: leftover } })
            .resolves({ UnprocessedItems: {} });

        await expect(writer.writeAll(items)).resolves.toEqual({ writtenCount: 3 });

        expect(requestsOf(1)).toEqual(leftover);
        expect(clock.sleeps).toEqual([100]);
    });

    it('should back off 100ms then 400ms and report what stayed unprocessed', async () => {
        const items = products(5);
        const stuck = items.slice(3).map(item => ({ PutRequest: { Item: productCodec.marshal(item) } }));
        ddbMock.on(BatchWriteItemCommand).resolves({ UnprocessedItems: { [TABLE]: stuck } });

        const error = await captureFailure(writer.writeAll(items));

        expect(error).toBeInstanceOf(PartialBatchFailureError);
        if (error instanceof PartialBatchFailureError) {
            expect(error.writtenCount).toBe(3);
            expect(error.remainingCount).toBe(2);
            expect(error.rejectedCount).toBe(0);
        }
        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 3);
        expect(clock.sleeps).toEqual([100, 400]);
    });

    it('should count a throttled call as an attempt', async () => {
        ddbMock.on(BatchWriteItemCommand)
            .rejectsOnce(awsError('ProvisionedThroughputExceededException'))
            .resolves({ UnprocessedItems: {} });

        await expect(writer.writeAll(products(2))).resolves.toEqual({ writtenCount: 2 });

        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 2);
        expect(clock.sleeps).toEqual([100]);
    });

    it('should record the throttling cause when every attempt is throttled', async () => {
        ddbMock.on(BatchWriteItemCommand).rejects(awsError('ThrottlingException'));

        const error = await captureFailure(writer.writeAll(products(4)));

        expect(error).toBeInstanceOf(PartialBatchFailureError);
        if (error instanceof PartialBatchFailureError) {
            expect(error.remainingCount).toBe(4);
            expect(error.causes).toHaveLength(1);
            expect(error.causes[0]).toBeInstanceOf(ThrottledError);
        }
        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 3);
    });

    it('should keep writing later chunks after a chunk is rejected', async () => {
        ddbMock.on(BatchWriteItemCommand)
            .rejectsOnce(awsError('ValidationException', 'Item size has exceeded the maximum allowed size'))
            .resolves({ UnprocessedItems: {} });

        const error = await captureFailure(writer.writeAll(products(30)));

        expect(error).toBeInstanceOf(PartialBatchFailureError);
        if (error instanceof PartialBatchFailureError) {
            expect(error.writtenCount).toBe(5);
            expect(error.remainingCount).toBe(25);
            expect(error.causes[0]).toBeInstanceOf(StoreError);
        }
        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 2);
        expect(clock.sleeps).toEqual([]);
    });

    it('should set aside items that cannot be encoded and write the rest', async () => {
        ddbMock.on(BatchWriteItemCommand).resolves({ UnprocessedItems: {} });
        const items = [makeProduct({ id: 'ok-1' }), makeProduct({ id: 'bad', price: Number.NaN }), makeProduct({ id: 'ok-2' })];

        const error = await captureFailure(writer.writeAll(items));

        expect(error).toBeInstanceOf(PartialBatchFailureError);
        if (error instanceof PartialBatchFailureError) {
            expect(error.writtenCount).toBe(2);
            expect(error.remainingCount).toBe(0);
            expect(error.rejectedCount).toBe(1);
            expect(error.causes[0]).toBeInstanceOf(EncodingError);
        }
        expect(requestsOf(0)).toHaveLength(2);
    });

    it('should stop with OperationCancelledError when aborted during backoff', async () => {
        const controller = new AbortController();
        const items = products(2);
        ddbMock.on(BatchWriteItemCommand).resolves({
            UnprocessedItems: { [TABLE]: [{ PutRequest: { Item: productCodec.marshal(items[1]) } }] },
        });
        clock.onSleep = () => controller.abort();

        await expect(writer.writeAll(items, controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 1);
    });

    it('should send nothing when already aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(writer.writeAll(products(1), controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
        expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 0);
    });

    describe('deleteAll()', () => {
        it('should send delete requests through the same chunking', async () => {
            ddbMock.on(BatchWriteItemCommand).resolves({ UnprocessedItems: {} });
            const keys = Array.from({ length: 26 }, (_, i) => ({ id: { S: `p${i}` } }));

            await expect(writer.deleteAll(keys)).resolves.toEqual({ writtenCount: 26 });

            expect(ddbMock).toHaveReceivedCommandTimes(BatchWriteItemCommand, 2);
            expect(requestsOf(1)).toEqual([{ DeleteRequest: { Key: { id: { S: 'p25' } } } }]);
        });
    });
});
