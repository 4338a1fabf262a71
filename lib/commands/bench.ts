import { Command } from "commander";
import { createDocumentClient } from "../client.js";
import { DriverFlags, parseList, parsePositiveInt, batchSizeParser, withDriverOptions } from "../config.js";
import { SetupError } from "../errors.js";
import { keyOf, loadKeysFile, scanKeyPool } from "../key-pool.js";
import { LoadTestDriver, Test } from "../load-test-runner.js";
import { BatchGetLoadTest, QueryLoadTest, ReadAfterWriteLoadTest } from "../load-tests.js";
import { Item, uniqueBy } from "../scan.js";
import { keyAttributes } from "../tables.js";
import { MAX_BATCH_GET_ITEMS } from "../targets.js";
import { CommandContext, commandContext, printResult, withInterrupt } from "./context.js";

async function runDriver(ctx: CommandContext, test: Test, flags: DriverFlags) {
  const result = await withInterrupt((signal) =>
    new LoadTestDriver(test, {
      concurrency: flags.concurrency,
      durationSeconds: flags.duration,
      targetRequestRatePerSecond: flags.rate,
      skipWarmup: flags.skipWarmup,
      signal,
      metrics: ctx.metrics,
    }).run(),
  );
  process.stdout.write("\n");
  printResult("Benchmark finished", result);
}

type BatchGetFlags = DriverFlags & {
  batchSize: number;
  keysFile?: string;
  scanLimit: number;
  projection?: string[];
};

export function benchBatchGetCommand(): Command {
  return withDriverOptions(new Command("bench-batch-get"), 50)
    .description("Read random samples of existing keys with BatchGetItem for a fixed duration")
    .option("-b, --batch-size <n>", `Keys per request, at most ${MAX_BATCH_GET_ITEMS}`, batchSizeParser(MAX_BATCH_GET_ITEMS), MAX_BATCH_GET_ITEMS)
    .option("--keys-file <path>", "Read the key pool from a scan-save file instead of scanning")
    .option("--scan-limit <n>", "Most items to scan for the key pool", parsePositiveInt, 100_000)
    .option("--projection <attributes>", "Comma-separated attributes to return", parseList)
    .action(async (flags: BatchGetFlags, command: Command) => {
      const ctx = commandContext(command);
      const attributes = await keyAttributes(ctx.documentClient, ctx.tableName);
      const pool = flags.keysFile
        ? await loadKeysFile(flags.keysFile)
        : await scanKeyPool(ctx.documentClient, { tableName: ctx.tableName, attributes, maxItems: flags.scanLimit });
      const keys = pool.map((item) => pickAttributes(item, attributes));

      const test = new BatchGetLoadTest({
        documentClient: ctx.documentClient,
        tableName: ctx.tableName,
        keys: uniqueBy(keys, (key) => keyOf(key, attributes)),
        batchSize: flags.batchSize,
        projection: flags.projection,
        progressMarker: flags.batchSize * 1_000,
      });
      await runDriver(ctx, test, flags);
    });
}

/** Keeps only the key attributes, so items saved with extra attributes still work as keys. */
export function pickAttributes(item: Item, attributes: string[]): Item {
  const key: Item = {};
  for (const attribute of attributes) {
    if (item[attribute] === undefined) {
      throw new SetupError(`Key item is missing attribute ${attribute}: ${JSON.stringify(item)}`);
    }
    key[attribute] = item[attribute];
  }
  return key;
}

type QueryFlags = DriverFlags & {
  index?: string;
  partitionKey?: string;
  scanLimit: number;
};

export function benchQueryCommand(): Command {
  return withDriverOptions(new Command("bench-query"), 100)
    .description("Query random partitions for a fixed duration")
    .option("-i, --index <name>", "Query this index instead of the table")
    .option("-k, --partition-key <attribute>", "Partition key attribute; defaults to the table's")
    .option("--scan-limit <n>", "Most items to scan for partition key values", parsePositiveInt, 100_000)
    .action(async (flags: QueryFlags, command: Command) => {
      const ctx = commandContext(command);
      if (flags.index && !flags.partitionKey) {
        throw new SetupError("--partition-key is required with --index");
      }
      const partitionKeyName = flags.partitionKey ?? (await keyAttributes(ctx.documentClient, ctx.tableName))[0];
      const pool = await scanKeyPool(ctx.documentClient, {
        tableName: ctx.tableName,
        attributes: [partitionKeyName],
        maxItems: flags.scanLimit,
      });

      const test = new QueryLoadTest({
        documentClient: ctx.documentClient,
        tableName: ctx.tableName,
        indexName: flags.index,
        partitionKeyName,
        partitionValues: pool.map((item) => item[partitionKeyName]),
        progressMarker: 1_000,
      });
      await runDriver(ctx, test, flags);
    });
}

type ReadAfterWriteFlags = DriverFlags & {
  secondaryRegion: string;
  secondaryEndpoint?: string;
  consistentRead?: boolean;
};

export function readAfterWriteCommand(): Command {
  return withDriverOptions(new Command("read-after-write"), 1)
    .description("Put a record in the primary region, then read it back in the primary and a secondary region")
    .requiredOption("--secondary-region <region>", "Region of the second replica")
    .option("--secondary-endpoint <url>", "Endpoint of the second replica")
    .option("--consistent-read", "Use strongly consistent reads")
    .action(async (flags: ReadAfterWriteFlags, command: Command) => {
      const ctx = commandContext(command);
      await keyAttributes(ctx.documentClient, ctx.tableName);
      const secondary = createDocumentClient({
        region: flags.secondaryRegion,
        endpoint: flags.secondaryEndpoint,
        local: ctx.options.local,
      });

      const test = new ReadAfterWriteLoadTest({
        primary: ctx.documentClient,
        secondary,
        tableName: ctx.tableName,
        consistentRead: flags.consistentRead,
      });
      await runDriver(ctx, test, flags);
    });
}
