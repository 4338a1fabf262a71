import * as ddc from "@aws-sdk/lib-dynamodb";
import { MetricsLogger } from "aws-embedded-metrics";
import { BackoffPolicy } from "./backoff.js";
import { BatchHarness, HarnessResult } from "./batch-harness.js";
import { ItemKey, BatchWriteTarget, MAX_BATCH_WRITE_ITEMS, WriteRequest, deleteRequest, projectionExpression } from "./targets.js";
import { keyAttributes } from "./tables.js";
import { scanAll } from "./scan.js";

export interface PurgeOptions {
  concurrency: number;
  batchSize?: number;
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  signal?: AbortSignal;
  metrics?: MetricsLogger;
}

export interface PurgeResult extends HarnessResult {
  keysFound: number;
}

/**
 * Deletes every item in the table. Keys are scanned with a projection of the
 * key attributes only, then deleted through the batch harness.
 */
export async function purgeTable(
  documentClient: ddc.DynamoDBDocumentClient,
  tableName: string,
  opts: PurgeOptions,
): Promise<PurgeResult> {
  const attributes = await keyAttributes(documentClient, tableName);
  const keys: ItemKey[] = await scanAll(documentClient, {
    TableName: tableName,
    ...projectionExpression(attributes),
  });
  console.log({ message: "Scanned keys to delete", tableName, keys: keys.length });

  const harness = new BatchHarness<WriteRequest>({
    target: new BatchWriteTarget(documentClient, tableName),
    generate: (offset, size) => keys.slice(offset, offset + size).map(deleteRequest),
    totalItems: keys.length,
    batchSize: opts.batchSize ?? MAX_BATCH_WRITE_ITEMS,
    concurrency: opts.concurrency,
    maxAttempts: opts.maxAttempts,
    backoff: opts.backoff,
    signal: opts.signal,
    metrics: opts.metrics,
  });
  const result = await harness.run();
  return { ...result, keysFound: keys.length };
}
