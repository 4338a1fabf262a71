import * as dynamodb from "@aws-sdk/client-dynamodb";
import * as ddc from "@aws-sdk/lib-dynamodb";
import { mockClient } from "aws-sdk-client-mock";
import "aws-sdk-client-mock-jest";
import { buildPerson } from "../lib/generators.js";
import { BatchGetLoadTest, QueryLoadTest, ReadAfterWriteLoadTest, sampleDistinct } from "../lib/load-tests.js";

function documentClient(region: string) {
  return ddc.DynamoDBDocumentClient.from(
    new dynamodb.DynamoDBClient({
      region,
      credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
    }),
  );
}

const keys = Array.from({ length: 50 }, (_, i) => ({ pk: `key${i}` }));

describe("sampleDistinct", () => {
  test("never picks the same entry twice", () => {
    const sample = sampleDistinct(keys, 20);

    expect(sample).toHaveLength(20);
    expect(new Set(sample).size).toBe(20);
    for (const key of sample) {
      expect(keys).toContain(key);
    }
  });

  test("returns the whole pool when it is too small", () => {
    expect(sampleDistinct([1, 2, 3], 10)).toEqual([1, 2, 3]);
  });
});

describe("BatchGetLoadTest", () => {
  const client = documentClient("localhost");
  const clientMock = mockClient(client);

  beforeEach(() => {
    clientMock.reset();
  });

  test("requests a batch of distinct keys and tallies the response", async () => {
    clientMock.on(ddc.BatchGetCommand).resolves({
      Responses: { reads: [{ pk: "key1" }, { pk: "key2" }] },
      UnprocessedKeys: { reads: { Keys: [{ pk: "key3" }] } },
      ConsumedCapacity: [{ TableName: "reads", CapacityUnits: 1.5 }],
    });
    const test = new BatchGetLoadTest({ documentClient: client, tableName: "reads", keys, batchSize: 10 });

    await test.performIteration();
    await test.performIteration();

    const sent = clientMock.commandCalls(ddc.BatchGetCommand)[0].args[0].input.RequestItems?.reads.Keys ?? [];
    expect(new Set(sent.map((key) => key.pk)).size).toBe(10);
    expect(test.requestsPerIteration()).toBe(10);
    expect(test.testRunData()).toEqual({
      keyPool: 50,
      batchSize: 10,
      keysRequested: 20,
      itemsReturned: 4,
      unprocessedKeys: 2,
      consumedReadCapacity: 3,
      retries: { sdk_retryAttempts: 0, sdk_retryDelay: 0 },
    });
  });

  test("a failed request fails the iteration", async () => {
    clientMock
      .on(ddc.BatchGetCommand)
      .rejects(new dynamodb.ResourceNotFoundException({ $metadata: {}, message: "Requested resource not found" }));
    const test = new BatchGetLoadTest({ documentClient: client, tableName: "reads", keys, batchSize: 5 });

    await expect(test.performIteration()).rejects.toThrow("Requested resource not found");
    expect(test.testRunData().keysRequested).toBe(0);
  });

  test("rejects batches larger than one request allows", () => {
    expect(() => new BatchGetLoadTest({ documentClient: client, tableName: "reads", keys, batchSize: 101 })).toThrow(
      "Batch size must be between 1 and 100, got 101",
    );
  });
});

describe("QueryLoadTest", () => {
  const client = documentClient("localhost");
  const clientMock = mockClient(client);

  test("queries one of the known partitions", async () => {
    clientMock.on(ddc.QueryCommand).resolves({ Items: [{ tile: "main#t1" }, { tile: "main#t1" }] });
    const test = new QueryLoadTest({
      documentClient: client,
      tableName: "maps",
      indexName: "tile-tsver-index",
      partitionKeyName: "tile",
      partitionValues: ["main#t1"],
    });

    await test.performIteration();

    expect(clientMock).toHaveReceivedCommandWith(ddc.QueryCommand, {
      TableName: "maps",
      IndexName: "tile-tsver-index",
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "tile" },
      ExpressionAttributeValues: { ":pk": "main#t1" },
    });
    expect(test.testRunData()).toMatchObject({ partitionKeys: 1, queries: 1, itemsRead: 2 });
  });

  test("needs at least one partition", () => {
    expect(
      () => new QueryLoadTest({ documentClient: client, tableName: "maps", partitionKeyName: "tile", partitionValues: [] }),
    ).toThrow(RangeError);
  });
});

describe("ReadAfterWriteLoadTest", () => {
  const primary = documentClient("us-east-1");
  const secondary = documentClient("us-west-2");
  const primaryMock = mockClient(primary);
  const secondaryMock = mockClient(secondary);

  beforeEach(() => {
    primaryMock.reset();
    secondaryMock.reset();
  });

  test("writes through the primary and reads back from both regions", async () => {
    const person = buildPerson(new Date("2024-06-01T00:00:00Z"));
    primaryMock.on(ddc.PutCommand).resolves({});
    primaryMock.on(ddc.GetCommand).resolves({ Item: person });
    secondaryMock.on(ddc.GetCommand).resolvesOnce({}).resolves({ Item: person });
    const test = new ReadAfterWriteLoadTest({
      primary,
      secondary,
      tableName: "people",
      consistentRead: true,
      buildItem: () => person,
    });

    await test.performIteration();
    await test.performIteration();

    expect(primaryMock).toHaveReceivedCommandWith(ddc.PutCommand, { TableName: "people", Item: person });
    expect(secondaryMock).toHaveReceivedCommandWith(ddc.GetCommand, {
      TableName: "people",
      Key: { id: person.id },
      ConsistentRead: true,
    });
    expect(secondaryMock).toHaveReceivedCommandTimes(ddc.PutCommand, 0);

    const data = test.testRunData();
    expect(data).toMatchObject({ writes: 2, primaryHits: 2, secondaryHits: 1, secondaryMisses: 1 });
    expect(data.phaseLatencyStatsMillis.put.p100).toBeGreaterThan(0);
    expect(test.requestsPerIteration()).toBe(3);
  });

  test("a failed write stops the iteration before any read", async () => {
    primaryMock.on(ddc.PutCommand).rejects(new Error("write refused"));

    const test = new ReadAfterWriteLoadTest({ primary, secondary, tableName: "people" });

    await expect(test.performIteration()).rejects.toThrow("write refused");
    expect(primaryMock).toHaveReceivedCommandTimes(ddc.GetCommand, 0);
    expect(test.testRunData().writes).toBe(0);
  });
});
