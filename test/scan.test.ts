import * as dynamodb from "@aws-sdk/client-dynamodb";
import * as ddc from "@aws-sdk/lib-dynamodb";
import { mockClient } from "aws-sdk-client-mock";
import "aws-sdk-client-mock-jest";
import { scanAll, scanPages, uniqueBy } from "../lib/scan.js";

const ddbMock = mockClient(ddc.DynamoDBDocumentClient);

const documentClient = ddc.DynamoDBDocumentClient.from(
  new dynamodb.DynamoDBClient({
    region: "localhost",
    credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
  }),
);

const TABLE_NAME = "loadtest";

beforeEach(() => {
  ddbMock.reset();
});

describe("scanPages", () => {
  test("follows LastEvaluatedKey until the table is exhausted", async () => {
    ddbMock
      .on(ddc.ScanCommand)
      .resolvesOnce({ Items: [{ pk: "a" }, { pk: "b" }], LastEvaluatedKey: { pk: "b" } })
      .resolvesOnce({ Items: [{ pk: "c" }] });

    expect(await scanAll(documentClient, { TableName: TABLE_NAME })).toEqual([{ pk: "a" }, { pk: "b" }, { pk: "c" }]);
    expect(ddbMock).toHaveReceivedCommandTimes(ddc.ScanCommand, 2);
    expect(ddbMock).toHaveReceivedNthCommandWith(2, ddc.ScanCommand, {
      TableName: TABLE_NAME,
      ExclusiveStartKey: { pk: "b" },
    });
  });

  test("stops once maxItems have been yielded", async () => {
    ddbMock
      .on(ddc.ScanCommand)
      .resolvesOnce({ Items: [{ pk: "a" }, { pk: "b" }], LastEvaluatedKey: { pk: "b" } })
      .resolvesOnce({ Items: [{ pk: "c" }, { pk: "d" }], LastEvaluatedKey: { pk: "d" } })
      .resolvesOnce({ Items: [{ pk: "e" }] });

    const pages: unknown[][] = [];
    for await (const page of scanPages(documentClient, { TableName: TABLE_NAME }, { maxItems: 3 })) {
      pages.push(page);
    }

    expect(pages).toEqual([[{ pk: "a" }, { pk: "b" }], [{ pk: "c" }]]);
    expect(ddbMock).toHaveReceivedCommandTimes(ddc.ScanCommand, 2);
  });

  test("a page without items is empty", async () => {
    ddbMock.on(ddc.ScanCommand).resolves({});

    expect(await scanAll(documentClient, { TableName: TABLE_NAME })).toEqual([]);
  });
});

describe("uniqueBy", () => {
  test("keeps the first occurrence in input order", () => {
    const items = [
      { oneid: "1", type: "a", seen: 1 },
      { oneid: "2", type: "a", seen: 2 },
      { oneid: "1", type: "a", seen: 3 },
      { oneid: "1", type: "b", seen: 4 },
    ];

    expect(uniqueBy(items, (item) => `${item.oneid}|${item.type}`).map((item) => item.seen)).toEqual([1, 2, 4]);
  });
});
