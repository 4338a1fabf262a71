import { Command } from "commander";
import { loadOrCreateLargeAccounts } from "../accounts.js";
import { runBulkInsert } from "../bulk-insert.js";
import { FileCheckpointStore } from "../checkpoint.js";
import {
  Environment,
  HarnessFlags,
  backoffFromFlags,
  parseNonNegativeInt,
  parsePositiveInt,
  withHarnessOptions,
} from "../config.js";
import {
  DEFAULT_COLUMN_LAYOUT,
  generateAccountEvents,
  generateColumnBatch,
  generateElementVersionBatch,
  generateMapBatch,
} from "../generators.js";
import { DEFAULT_REPORT_INTERVAL_MS } from "../reporter.js";
import { describeTable } from "../tables.js";
import { BatchWriteTarget, MAX_BATCH_WRITE_ITEMS, WriteItem, putRequest } from "../targets.js";
import { commandContext, printResult, withInterrupt } from "./context.js";

type RecordInsertFlags = HarnessFlags & {
  count: number;
  baseTime?: number;
  checkpointFile: string;
  resume?: boolean;
  reportInterval: number;
};

function withRecordInsertOptions(name: string, count: number, checkpointFile: string): Command {
  return withHarnessOptions(new Command(name), MAX_BATCH_WRITE_ITEMS, 10)
    .option("-n, --count <n>", "Records to insert", parsePositiveInt, count)
    .option(
      "--base-time <millis>",
      "Newest version timestamp; pass the logged value again when resuming",
      parseNonNegativeInt,
    )
    .option("--checkpoint-file <path>", "Where progress is recorded", checkpointFile)
    .option("--resume", "Continue from the offset in the checkpoint file")
    .option("--report-interval <millis>", "Progress report interval", parsePositiveInt, DEFAULT_REPORT_INTERVAL_MS);
}

/**
 * Writes `flags.count` generated records through the batch harness. Records
 * are a pure function of their offset and the base time, so a resumed run
 * with the same base time writes the same items.
 */
async function insertRecords(
  command: Command,
  flags: RecordInsertFlags,
  kind: string,
  generate: (offset: number, size: number, baseTime: number) => WriteItem[],
): Promise<void> {
  const ctx = commandContext(command);
  await describeTable(ctx.documentClient, ctx.tableName);

  const baseTime = flags.baseTime ?? Date.now();
  console.log({
    message: "Starting bulk insert",
    kind,
    tableName: ctx.tableName,
    count: flags.count,
    baseTime,
    batchSize: flags.batchSize,
    concurrency: flags.concurrency,
  });

  const result = await withInterrupt((signal) =>
    runBulkInsert({
      target: new BatchWriteTarget(ctx.documentClient, ctx.tableName),
      generate: (offset, size) => generate(offset, size, baseTime).map(putRequest),
      totalItems: flags.count,
      batchSize: flags.batchSize,
      concurrency: flags.concurrency,
      maxAttempts: flags.maxAttempts,
      backoff: backoffFromFlags(flags),
      signal,
      metrics: ctx.metrics,
      checkpoint: new FileCheckpointStore(flags.checkpointFile),
      resume: flags.resume,
      reportIntervalMs: flags.reportInterval,
    }),
  );
  printResult("Bulk insert finished", { ...result, kind, baseTime });
}

export function insertCommand(env: Environment): Command {
  return withRecordInsertOptions("insert", 10_000, env.CHECKPOINT_FILE)
    .description("Bulk insert synthetic map records with BatchWriteItem")
    .action((flags: RecordInsertFlags, command: Command) =>
      insertRecords(command, flags, "map", (offset, size, baseTime) =>
        generateMapBatch(offset, size, { baseTime, maxBatchSize: MAX_BATCH_WRITE_ITEMS }),
      ),
    );
}

type InsertColumnsFlags = RecordInsertFlags & {
  columns: number;
  versions: number;
};

export function insertColumnsCommand(): Command {
  return withRecordInsertOptions(
    "insert-columns",
    DEFAULT_COLUMN_LAYOUT.columnsPerElement * DEFAULT_COLUMN_LAYOUT.versionsPerColumn * 100,
    "columns_insert_progress.json",
  )
    .description("Bulk insert versioned column readings keyed by element#column and timestamp")
    .option("--columns <n>", "Columns per element", parsePositiveInt, DEFAULT_COLUMN_LAYOUT.columnsPerElement)
    .option("--versions <n>", "Versions per column", parsePositiveInt, DEFAULT_COLUMN_LAYOUT.versionsPerColumn)
    .action((flags: InsertColumnsFlags, command: Command) => {
      const layout = { columnsPerElement: flags.columns, versionsPerColumn: flags.versions };
      return insertRecords(command, flags, "columns", (offset, size, baseTime) =>
        generateColumnBatch(offset, size, { baseTime, layout, maxBatchSize: MAX_BATCH_WRITE_ITEMS }),
      );
    });
}

type InsertElementsFlags = RecordInsertFlags & {
  versionsPerElement: number;
};

export function insertElementsCommand(): Command {
  return withRecordInsertOptions("insert-elements", 3_000, "elements_insert_progress.json")
    .description("Bulk insert numbered element versions spread over ten blocks")
    .option("--versions-per-element <n>", "Versions written for each element", parsePositiveInt, 3)
    .action((flags: InsertElementsFlags, command: Command) =>
      insertRecords(command, flags, "elements", (offset, size, baseTime) =>
        generateElementVersionBatch(offset, size, {
          baseTime,
          versionsPerElement: flags.versionsPerElement,
          maxBatchSize: MAX_BATCH_WRITE_ITEMS,
        }),
      ),
    );
}

type InsertEventsFlags = HarnessFlags & {
  count: number;
  largeAccounts: number;
  accountsFile: string;
  checkpointFile?: string;
  resume?: boolean;
  reportInterval: number;
};

export function insertEventsCommand(): Command {
  return withHarnessOptions(new Command("insert-events"), MAX_BATCH_WRITE_ITEMS, 10)
    .description("Bulk insert random account events, half of them on a few large accounts")
    .option("-n, --count <n>", "Events to insert", parsePositiveInt, 100_000)
    .option("--large-accounts <n>", "Large accounts to generate when the accounts file is missing", parsePositiveInt, 5)
    .option("--accounts-file <path>", "JSON list of large account addresses", "large_accounts.json")
    .option("--checkpoint-file <path>", "Record progress here so the run can be resumed")
    .option("--resume", "Continue from the offset in the checkpoint file")
    .option("--report-interval <millis>", "Progress report interval", parsePositiveInt, DEFAULT_REPORT_INTERVAL_MS)
    .action(async (flags: InsertEventsFlags, command: Command) => {
      if (flags.resume && !flags.checkpointFile) {
        command.error("--resume needs --checkpoint-file");
      }
      const ctx = commandContext(command);
      await describeTable(ctx.documentClient, ctx.tableName);
      const largeAccounts = await loadOrCreateLargeAccounts(flags.accountsFile, flags.largeAccounts);

      const result = await withInterrupt((signal) =>
        runBulkInsert({
          target: new BatchWriteTarget(ctx.documentClient, ctx.tableName),
          generate: (offset, size) => generateAccountEvents(offset, size, largeAccounts).map(putRequest),
          totalItems: flags.count,
          batchSize: flags.batchSize,
          concurrency: flags.concurrency,
          maxAttempts: flags.maxAttempts,
          backoff: backoffFromFlags(flags),
          signal,
          metrics: ctx.metrics,
          checkpoint: flags.checkpointFile ? new FileCheckpointStore(flags.checkpointFile) : undefined,
          resume: flags.resume,
          reportIntervalMs: flags.reportInterval,
        }),
      );
      printResult("Event insert finished", { ...result, largeAccounts });
    });
}
