import * as ddc from "@aws-sdk/lib-dynamodb";
import { randomInt } from "crypto";
import { createHistogram, performance, RecordableHistogram } from "perf_hooks";
import { sdkRetryStats } from "./errors.js";
import { buildPerson, PersonRecord } from "./generators.js";
import { AbstractBaseTest, LatencyStats, latencyStats } from "./load-test-runner.js";
import { BatchGetTarget, ItemKey, MAX_BATCH_GET_ITEMS } from "./targets.js";

/** Picks `count` distinct entries at random; the whole pool when it is smaller. */
export function sampleDistinct<T>(pool: readonly T[], count: number): T[] {
  if (count >= pool.length) {
    return [...pool];
  }
  const picked = new Set<number>();
  while (picked.size < count) {
    picked.add(randomInt(0, pool.length));
  }
  return Array.from(picked, (i) => pool[i]);
}

/** Queries one randomly chosen partition per iteration. */
export class QueryLoadTest extends AbstractBaseTest {
  private readonly documentClient: ddc.DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly indexName?: string;
  private readonly partitionKeyName: string;
  private readonly partitionValues: readonly unknown[];
  private readonly progressMarker: number | undefined;
  private _queries = 0;
  private _itemsRead = 0;
  private _sdk_retryDelay = 0;
  private _sdk_retryAttempts = 0;

  constructor(opts: {
    documentClient: ddc.DynamoDBDocumentClient;
    tableName: string;
    indexName?: string;
    partitionKeyName: string;
    partitionValues: readonly unknown[];
    progressMarker?: number;
  }) {
    super();
    if (opts.partitionValues.length === 0) {
      throw new RangeError("QueryLoadTest needs at least one partition key value");
    }
    this.documentClient = opts.documentClient;
    this.tableName = opts.tableName;
    this.indexName = opts.indexName;
    this.partitionKeyName = opts.partitionKeyName;
    this.partitionValues = opts.partitionValues;
    this.progressMarker = opts.progressMarker;
  }

  async performIteration() {
    const value = this.partitionValues[randomInt(0, this.partitionValues.length)];
    try {
      const result = await this.documentClient.send(
        new ddc.QueryCommand({
          TableName: this.tableName,
          IndexName: this.indexName,
          KeyConditionExpression: "#pk = :pk",
          ExpressionAttributeNames: { "#pk": this.partitionKeyName },
          ExpressionAttributeValues: { ":pk": value },
        }),
      );
      this._queries += 1;
      this._itemsRead += result.Items?.length ?? 0;
      if (this.progressMarker && this._queries % this.progressMarker == 0) {
        process.stdout.write("-");
      }
      this.recordSdkRetries(result);
    } catch (err) {
      this.recordSdkRetries(err);
      throw err;
    }
  }

  private recordSdkRetries(source: unknown) {
    const sdk = sdkRetryStats(source);
    this._sdk_retryAttempts += sdk.attempts;
    this._sdk_retryDelay += sdk.totalRetryDelay;
  }

  testRunData() {
    return {
      partitionKeys: this.partitionValues.length,
      queries: this._queries,
      itemsRead: this._itemsRead,
      retries: {
        sdk_retryAttempts: this._sdk_retryAttempts,
        sdk_retryDelay: this._sdk_retryDelay,
      },
    };
  }
}

/**
 * Reads a random sample of known keys with a single BatchGetItem per
 * iteration. Unprocessed keys are counted, not retried.
 */
export class BatchGetLoadTest extends AbstractBaseTest {
  private readonly target: BatchGetTarget;
  private readonly keys: readonly ItemKey[];
  private readonly batchSize: number;
  private readonly progressMarker: number | undefined;
  private _keysRequested = 0;
  private _itemsReturned = 0;
  private _unprocessedKeys = 0;
  private _consumedReadCapacity = 0;
  private _sdk_retryDelay = 0;
  private _sdk_retryAttempts = 0;

  constructor(opts: {
    documentClient: ddc.DynamoDBDocumentClient;
    tableName: string;
    keys: readonly ItemKey[];
    batchSize: number;
    projection?: string[];
    progressMarker?: number;
  }) {
    super();
    if (opts.keys.length === 0) {
      throw new RangeError("BatchGetLoadTest needs at least one key");
    }
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1 || opts.batchSize > MAX_BATCH_GET_ITEMS) {
      throw new RangeError(`Batch size must be between 1 and ${MAX_BATCH_GET_ITEMS}, got ${opts.batchSize}`);
    }
    this.target = new BatchGetTarget(opts.documentClient, opts.tableName, { projection: opts.projection });
    this.keys = opts.keys;
    this.batchSize = opts.batchSize;
    this.progressMarker = opts.progressMarker;
  }

  async performIteration() {
    const keys = sampleDistinct(this.keys, this.batchSize);
    const outcome = await this.target.submit(keys);

    this._sdk_retryAttempts += outcome.stats.sdkRetryAttempts;
    this._sdk_retryDelay += outcome.stats.sdkRetryDelayMs;
    if (outcome.kind === "rejected") {
      throw outcome.error;
    }

    this._keysRequested += keys.length;
    // Keys that don't exist are simply missing from the response, so this can
    // be lower than the number requested.
    this._itemsReturned += outcome.stats.observed;
    this._consumedReadCapacity += outcome.stats.consumedCapacity;
    if (outcome.kind === "partial") {
      this._unprocessedKeys += outcome.remaining.length;
    }
    if (this.progressMarker && this._keysRequested % this.progressMarker == 0) {
      process.stdout.write("-");
    }
  }

  requestsPerIteration() {
    return this.batchSize;
  }

  testRunData() {
    return {
      keyPool: this.keys.length,
      batchSize: this.batchSize,
      keysRequested: this._keysRequested,
      itemsReturned: this._itemsReturned,
      unprocessedKeys: this._unprocessedKeys,
      consumedReadCapacity: this._consumedReadCapacity,
      retries: {
        sdk_retryAttempts: this._sdk_retryAttempts,
        sdk_retryDelay: this._sdk_retryDelay,
      },
    };
  }
}

type Phase = "put" | "getPrimary" | "getSecondary";

/**
 * Writes a new record through the primary client, then reads it back through
 * the primary and the secondary client. Against a multi-region table this
 * shows how often the secondary read already sees the write.
 */
export class ReadAfterWriteLoadTest extends AbstractBaseTest {
  private readonly primary: ddc.DynamoDBDocumentClient;
  private readonly secondary: ddc.DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly consistentRead: boolean;
  private readonly buildItem: () => PersonRecord;
  private readonly phaseMicros: Record<Phase, RecordableHistogram> = {
    put: createHistogram(),
    getPrimary: createHistogram(),
    getSecondary: createHistogram(),
  };
  private _writes = 0;
  private _primaryHits = 0;
  private _secondaryHits = 0;
  private _secondaryMisses = 0;

  constructor(opts: {
    primary: ddc.DynamoDBDocumentClient;
    secondary: ddc.DynamoDBDocumentClient;
    tableName: string;
    consistentRead?: boolean;
    buildItem?: () => PersonRecord;
  }) {
    super();
    this.primary = opts.primary;
    this.secondary = opts.secondary;
    this.tableName = opts.tableName;
    this.consistentRead = opts.consistentRead ?? false;
    this.buildItem = opts.buildItem ?? (() => buildPerson());
  }

  async performIteration() {
    const item = this.buildItem();
    const key = { id: item.id };

    await this.timed("put", () => this.primary.send(new ddc.PutCommand({ TableName: this.tableName, Item: item })));
    this._writes += 1;

    const primary = await this.timed("getPrimary", () =>
      this.primary.send(new ddc.GetCommand({ TableName: this.tableName, Key: key, ConsistentRead: this.consistentRead })),
    );
    if (primary.Item) {
      this._primaryHits += 1;
    }

    const secondary = await this.timed("getSecondary", () =>
      this.secondary.send(
        new ddc.GetCommand({ TableName: this.tableName, Key: key, ConsistentRead: this.consistentRead }),
      ),
    );
    if (secondary.Item) {
      this._secondaryHits += 1;
    } else {
      this._secondaryMisses += 1;
    }
  }

  private async timed<R>(phase: Phase, fn: () => Promise<R>): Promise<R> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.phaseMicros[phase].record(Math.max(Math.round((performance.now() - start) * 1000), 1));
    }
  }

  requestsPerIteration() {
    return 3;
  }

  testRunData(): {
    writes: number;
    primaryHits: number;
    secondaryHits: number;
    secondaryMisses: number;
    phaseLatencyStatsMillis: Record<Phase, LatencyStats>;
  } {
    return {
      writes: this._writes,
      primaryHits: this._primaryHits,
      secondaryHits: this._secondaryHits,
      secondaryMisses: this._secondaryMisses,
      phaseLatencyStatsMillis: {
        put: latencyStats(this.phaseMicros.put),
        getPrimary: latencyStats(this.phaseMicros.getPrimary),
        getSecondary: latencyStats(this.phaseMicros.getSecondary),
      },
    };
  }
}
