import * as ddc from "@aws-sdk/lib-dynamodb";
import { BatchTarget, SubmitOutcome } from "./batch-harness.js";
import { AttemptStats } from "./counters.js";
import { classifyError, sdkRetryStats } from "./errors.js";

/** DynamoDB limit for BatchWriteItem. */
export const MAX_BATCH_WRITE_ITEMS = 25;

/** DynamoDB limit for BatchGetItem. */
export const MAX_BATCH_GET_ITEMS = 100;

export type WriteRequest = NonNullable<ddc.BatchWriteCommandInput["RequestItems"]>[string][number];

export type WriteItem = NonNullable<NonNullable<WriteRequest["PutRequest"]>["Item"]>;

export type ItemKey = Record<string, unknown>;

type ConsumedCapacityList = ddc.BatchWriteCommandOutput["ConsumedCapacity"];

function capacityUnits(consumed: ConsumedCapacityList): number {
  return (consumed ?? []).reduce((sum, c) => sum + (c.CapacityUnits ?? 0), 0);
}

function rejected<T>(err: unknown): SubmitOutcome<T> {
  const sdk = sdkRetryStats(err);
  return {
    kind: "rejected",
    error: err,
    retryable: classifyError(err) === "throttling",
    stats: { observed: 0, consumedCapacity: 0, sdkRetryAttempts: sdk.attempts, sdkRetryDelayMs: sdk.totalRetryDelay },
  };
}

export function putRequest(item: WriteItem): WriteRequest {
  return { PutRequest: { Item: item } };
}

export function deleteRequest(key: ItemKey): WriteRequest {
  return { DeleteRequest: { Key: key } };
}

/**
 * Submits put and delete requests with BatchWriteItem. Whatever comes back in
 * `UnprocessedItems` is the remainder to retry.
 */
export class BatchWriteTarget implements BatchTarget<WriteRequest> {
  readonly name: string;
  readonly maxBatchSize = MAX_BATCH_WRITE_ITEMS;
  private readonly documentClient: ddc.DynamoDBDocumentClient;
  private readonly tableName: string;

  constructor(documentClient: ddc.DynamoDBDocumentClient, tableName: string) {
    this.documentClient = documentClient;
    this.tableName = tableName;
    this.name = `BatchWrite:${tableName}`;
  }

  async submit(items: readonly WriteRequest[]): Promise<SubmitOutcome<WriteRequest>> {
    try {
      const result = await this.documentClient.send(
        new ddc.BatchWriteCommand({
          RequestItems: { [this.tableName]: [...items] },
          ReturnConsumedCapacity: "TOTAL",
        }),
      );
      const remaining = result.UnprocessedItems?.[this.tableName] ?? [];
      const sdk = sdkRetryStats(result);
      const stats: AttemptStats = {
        observed: items.length - remaining.length,
        consumedCapacity: capacityUnits(result.ConsumedCapacity),
        sdkRetryAttempts: sdk.attempts,
        sdkRetryDelayMs: sdk.totalRetryDelay,
      };
      return remaining.length > 0 ? { kind: "partial", remaining, stats } : { kind: "complete", stats };
    } catch (err) {
      return rejected(err);
    }
  }
}

/**
 * Reads keys with BatchGetItem. Keys that don't exist are simply absent from
 * the response; only `UnprocessedKeys` is retried.
 */
export class BatchGetTarget implements BatchTarget<ItemKey> {
  readonly name: string;
  readonly maxBatchSize = MAX_BATCH_GET_ITEMS;
  private readonly documentClient: ddc.DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly projection?: string[];

  constructor(documentClient: ddc.DynamoDBDocumentClient, tableName: string, opts: { projection?: string[] } = {}) {
    this.documentClient = documentClient;
    this.tableName = tableName;
    this.projection = opts.projection;
    this.name = `BatchGet:${tableName}`;
  }

  async submit(keys: readonly ItemKey[]): Promise<SubmitOutcome<ItemKey>> {
    try {
      const result = await this.documentClient.send(
        new ddc.BatchGetCommand({
          RequestItems: { [this.tableName]: { Keys: [...keys], ...projectionExpression(this.projection) } },
          ReturnConsumedCapacity: "TOTAL",
        }),
      );
      const remaining = result.UnprocessedKeys?.[this.tableName]?.Keys ?? [];
      const sdk = sdkRetryStats(result);
      const stats: AttemptStats = {
        observed: result.Responses?.[this.tableName]?.length ?? 0,
        consumedCapacity: capacityUnits(result.ConsumedCapacity),
        sdkRetryAttempts: sdk.attempts,
        sdkRetryDelayMs: sdk.totalRetryDelay,
      };
      return remaining.length > 0 ? { kind: "partial", remaining, stats } : { kind: "complete", stats };
    } catch (err) {
      return rejected(err);
    }
  }
}

/**
 * Builds a ProjectionExpression with a placeholder per attribute, since names
 * such as `type` are reserved words.
 */
export function projectionExpression(
  attributes: string[] | undefined,
): { ProjectionExpression?: string; ExpressionAttributeNames?: Record<string, string> } {
  if (!attributes || attributes.length === 0) {
    return {};
  }
  const names: Record<string, string> = {};
  const placeholders = attributes.map((attribute, i) => {
    names[`#p${i}`] = attribute;
    return `#p${i}`;
  });
  return { ProjectionExpression: placeholders.join(", "), ExpressionAttributeNames: names };
}
