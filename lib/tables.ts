import * as dynamodb from "@aws-sdk/client-dynamodb";
import * as ddc from "@aws-sdk/lib-dynamodb";
import { setTimeout as sleep } from "timers/promises";
import { SetupError } from "./errors.js";

export const TILE_VERSION_INDEX = "tile-tsver-index";

/**
 * Looks the table up before any load is generated. A missing table or an
 * unreachable endpoint ends the run here.
 */
export async function describeTable(
  documentClient: ddc.DynamoDBDocumentClient,
  tableName: string,
): Promise<dynamodb.TableDescription> {
  try {
    const result = await documentClient.send(new dynamodb.DescribeTableCommand({ TableName: tableName }));
    if (!result.Table) {
      throw new SetupError(`Table ${tableName} has no description`);
    }
    return result.Table;
  } catch (err) {
    if (err instanceof SetupError) {
      throw err;
    }
    if (err instanceof dynamodb.ResourceNotFoundException) {
      throw new SetupError(`Table ${tableName} does not exist`, err);
    }
    throw new SetupError(`Cannot describe table ${tableName}`, err);
  }
}

export async function keyAttributes(documentClient: ddc.DynamoDBDocumentClient, tableName: string): Promise<string[]> {
  const table = await describeTable(documentClient, tableName);
  const names = (table.KeySchema ?? []).flatMap((key) => (key.AttributeName ? [key.AttributeName] : []));
  if (names.length === 0) {
    throw new SetupError(`Table ${tableName} reports no key schema`);
  }
  return names;
}

export type TableSchema = "map" | "events" | "people" | "columns" | "elements";

export const TABLE_SCHEMA_NAMES: readonly TableSchema[] = ["map", "events", "people", "columns", "elements"];

export const VOLUME_INDEX = "volume-index";
export const BLOCK_TIME_INDEX = "block-timestamp-index";
export const BLOCK_VERSION_INDEX = "block-version-index";

type CreateTableShape = Pick<
  dynamodb.CreateTableCommandInput,
  "KeySchema" | "AttributeDefinitions" | "GlobalSecondaryIndexes"
>;

/**
 * Key layouts of the tables the load commands write to. Map records are keyed
 * by `bte` and version, events by account and event id, people by id. Column
 * readings and element versions are both keyed by their element and a
 * timestamp, with an index per block.
 */
export const TABLE_SCHEMAS: Record<TableSchema, CreateTableShape> = {
  map: {
    KeySchema: [
      { AttributeName: "bte", KeyType: "HASH" },
      { AttributeName: "tsver", KeyType: "RANGE" },
    ],
    AttributeDefinitions: [
      { AttributeName: "bte", AttributeType: "S" },
      { AttributeName: "tsver", AttributeType: "N" },
      { AttributeName: "tile", AttributeType: "S" },
    ],
    GlobalSecondaryIndexes: [
      {
        IndexName: TILE_VERSION_INDEX,
        KeySchema: [
          { AttributeName: "tile", KeyType: "HASH" },
          { AttributeName: "tsver", KeyType: "RANGE" },
        ],
        Projection: { ProjectionType: "ALL" },
      },
    ],
  },
  events: {
    KeySchema: [
      { AttributeName: "account_address", KeyType: "HASH" },
      { AttributeName: "event_id", KeyType: "RANGE" },
    ],
    AttributeDefinitions: [
      { AttributeName: "account_address", AttributeType: "S" },
      { AttributeName: "event_id", AttributeType: "N" },
      { AttributeName: "volume", AttributeType: "N" },
    ],
    GlobalSecondaryIndexes: [
      {
        IndexName: VOLUME_INDEX,
        KeySchema: [
          { AttributeName: "account_address", KeyType: "HASH" },
          { AttributeName: "volume", KeyType: "RANGE" },
        ],
        Projection: { ProjectionType: "ALL" },
      },
    ],
  },
  people: {
    KeySchema: [{ AttributeName: "id", KeyType: "HASH" }],
    AttributeDefinitions: [{ AttributeName: "id", AttributeType: "S" }],
  },
  columns: {
    KeySchema: [
      { AttributeName: "element_col_id", KeyType: "HASH" },
      { AttributeName: "timestamp", KeyType: "RANGE" },
    ],
    AttributeDefinitions: [
      { AttributeName: "element_col_id", AttributeType: "S" },
      { AttributeName: "timestamp", AttributeType: "N" },
      { AttributeName: "block_id", AttributeType: "S" },
    ],
    GlobalSecondaryIndexes: [
      {
        IndexName: BLOCK_TIME_INDEX,
        KeySchema: [
          { AttributeName: "block_id", KeyType: "HASH" },
          { AttributeName: "timestamp", KeyType: "RANGE" },
        ],
        Projection: { ProjectionType: "ALL" },
      },
    ],
  },
  elements: {
    KeySchema: [
      { AttributeName: "ele", KeyType: "HASH" },
      { AttributeName: "timestamp", KeyType: "RANGE" },
    ],
    AttributeDefinitions: [
      { AttributeName: "ele", AttributeType: "S" },
      { AttributeName: "timestamp", AttributeType: "N" },
      { AttributeName: "block", AttributeType: "S" },
      { AttributeName: "version", AttributeType: "N" },
    ],
    GlobalSecondaryIndexes: [
      {
        IndexName: BLOCK_VERSION_INDEX,
        KeySchema: [
          { AttributeName: "block", KeyType: "HASH" },
          { AttributeName: "version", KeyType: "RANGE" },
        ],
        Projection: { ProjectionType: "ALL" },
      },
    ],
  },
};

export async function createTable(
  documentClient: ddc.DynamoDBDocumentClient,
  tableName: string,
  schema: TableSchema,
  opts: { recreateIfExists: boolean; waitSeconds?: number },
): Promise<"created" | "exists"> {
  const waitSeconds = opts.waitSeconds ?? 300;

  if (!opts.recreateIfExists) {
    try {
      await documentClient.send(new dynamodb.DescribeTableCommand({ TableName: tableName }));
      console.log({ message: "Table already exists, not re-creating.", tableName });
      return "exists";
    } catch (err) {
      if (!(err instanceof dynamodb.ResourceNotFoundException)) {
        throw err;
      }
    }
  } else {
    try {
      await documentClient.send(new dynamodb.DeleteTableCommand({ TableName: tableName }));
      await waitForTable(documentClient, tableName, "DELETED", waitSeconds);
      console.log({ message: "Deleted existing table.", tableName });
    } catch (err) {
      if (!(err instanceof dynamodb.ResourceNotFoundException)) {
        throw err;
      }
    }
  }

  await documentClient.send(
    new dynamodb.CreateTableCommand({
      TableName: tableName,
      ...TABLE_SCHEMAS[schema],
      BillingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
    }),
  );
  await waitForTable(documentClient, tableName, "ACTIVE", waitSeconds);
  console.log({ message: "Created empty table.", tableName, schema });
  return "created";
}

const TABLE_POLL_INTERVAL_MS = 2_000;

/** Polls DescribeTable until the table is active, or gone. */
export async function waitForTable(
  documentClient: ddc.DynamoDBDocumentClient,
  tableName: string,
  state: "ACTIVE" | "DELETED",
  waitSeconds: number,
): Promise<void> {
  const deadline = Date.now() + waitSeconds * 1_000;
  for (;;) {
    try {
      const result = await documentClient.send(new dynamodb.DescribeTableCommand({ TableName: tableName }));
      if (state === "ACTIVE" && result.Table?.TableStatus === dynamodb.TableStatus.ACTIVE) {
        return;
      }
    } catch (err) {
      if (!(err instanceof dynamodb.ResourceNotFoundException)) {
        throw err;
      }
      if (state === "DELETED") {
        return;
      }
    }
    if (Date.now() >= deadline) {
      throw new SetupError(`Timed out waiting for table ${tableName} to become ${state}`);
    }
    await sleep(TABLE_POLL_INTERVAL_MS);
  }
}
