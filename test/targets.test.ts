import * as dynamodb from "@aws-sdk/client-dynamodb";
import * as ddc from "@aws-sdk/lib-dynamodb";
import { mockClient } from "aws-sdk-client-mock";
import "aws-sdk-client-mock-jest";
import { submitWithRetry } from "../lib/batch-harness.js";
import { BatchGetTarget, BatchWriteTarget, projectionExpression, putRequest } from "../lib/targets.js";

const ddbMock = mockClient(ddc.DynamoDBDocumentClient);

const dynamoDbClient = new dynamodb.DynamoDBClient({
  region: "localhost",
  credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
});
const documentClient = ddc.DynamoDBDocumentClient.from(dynamoDbClient, {
  marshallOptions: { removeUndefinedValues: true },
});

const TABLE_NAME = "loadtest";

const items = Array.from({ length: 25 }, (_, i) => ({ pk: `item${i}`, value: i }));

beforeEach(() => {
  ddbMock.reset();
});

describe("BatchWriteTarget", () => {
  const target = new BatchWriteTarget(documentClient, TABLE_NAME);

  test("reports the unprocessed requests as the remainder", async () => {
    const requests = items.map(putRequest);
    ddbMock.on(ddc.BatchWriteCommand).resolves({
      UnprocessedItems: { [TABLE_NAME]: requests.slice(10) },
      ConsumedCapacity: [{ TableName: TABLE_NAME, CapacityUnits: 10 }],
      $metadata: { attempts: 3, totalRetryDelay: 120 },
    });

    const outcome = await target.submit(requests);

    expect(outcome).toEqual({
      kind: "partial",
      remaining: requests.slice(10),
      stats: { observed: 10, consumedCapacity: 10, sdkRetryAttempts: 2, sdkRetryDelayMs: 120 },
    });
    expect(ddbMock).toHaveReceivedCommandWith(ddc.BatchWriteCommand, {
      RequestItems: { [TABLE_NAME]: requests },
      ReturnConsumedCapacity: "TOTAL",
    });
  });

  test("an empty response is a complete batch", async () => {
    ddbMock.on(ddc.BatchWriteCommand).resolves({ UnprocessedItems: {} });

    const outcome = await target.submit(items.slice(0, 3).map(putRequest));

    expect(outcome.kind).toBe("complete");
    expect(outcome.stats.observed).toBe(3);
  });

  test("throttling exceptions are retryable", async () => {
    ddbMock.on(ddc.BatchWriteCommand).rejects(
      new dynamodb.ProvisionedThroughputExceededException({ $metadata: {}, message: "Rate exceeded" }),
    );

    const outcome = await target.submit(items.slice(0, 1).map(putRequest));

    expect(outcome).toMatchObject({ kind: "rejected", retryable: true });
  });

  test("other service errors are not retryable", async () => {
    ddbMock.on(ddc.BatchWriteCommand).rejects(
      new dynamodb.ResourceNotFoundException({ $metadata: {}, message: "Requested resource not found" }),
    );

    const outcome = await target.submit(items.slice(0, 1).map(putRequest));

    expect(outcome).toMatchObject({ kind: "rejected", retryable: false });
  });

  test("the retry loop resends only what the table left unprocessed", async () => {
    const requests = items.map(putRequest);
    ddbMock
      .on(ddc.BatchWriteCommand)
      .resolvesOnce({ UnprocessedItems: { [TABLE_NAME]: requests.slice(10) } })
      .resolves({ UnprocessedItems: {} });

    const result = await submitWithRetry(
      target,
      { offset: 0, items: requests },
      { maxAttempts: 5, backoff: { baseDelayMs: 1, maxDelayMs: 4, jitter: false } },
    );

    expect(result).toMatchObject({ ok: true, attempts: 2 });
    expect(ddbMock).toHaveReceivedCommandTimes(ddc.BatchWriteCommand, 2);
    expect(ddbMock).toHaveReceivedNthCommandWith(2, ddc.BatchWriteCommand, {
      RequestItems: { [TABLE_NAME]: requests.slice(10) },
    });
  });
});

describe("BatchGetTarget", () => {
  const target = new BatchGetTarget(documentClient, TABLE_NAME, { projection: ["pk", "type"] });
  const keys = items.slice(0, 4).map(({ pk }) => ({ pk }));

  test("counts returned items and retries unprocessed keys", async () => {
    ddbMock.on(ddc.BatchGetCommand).resolves({
      Responses: { [TABLE_NAME]: [items[0], items[1]] },
      UnprocessedKeys: { [TABLE_NAME]: { Keys: [keys[3]] } },
    });

    const outcome = await target.submit(keys);

    expect(outcome).toMatchObject({ kind: "partial", remaining: [keys[3]], stats: { observed: 2 } });
    expect(ddbMock).toHaveReceivedCommandWith(ddc.BatchGetCommand, {
      RequestItems: {
        [TABLE_NAME]: {
          Keys: keys,
          ProjectionExpression: "#p0, #p1",
          ExpressionAttributeNames: { "#p0": "pk", "#p1": "type" },
        },
      },
    });
  });

  test("missing keys are not an error", async () => {
    ddbMock.on(ddc.BatchGetCommand).resolves({ Responses: { [TABLE_NAME]: [] } });

    const outcome = await target.submit(keys);

    expect(outcome).toMatchObject({ kind: "complete", stats: { observed: 0 } });
  });
});

describe("projectionExpression", () => {
  test("is empty without attributes", () => {
    expect(projectionExpression(undefined)).toEqual({});
    expect(projectionExpression([])).toEqual({});
  });
});
