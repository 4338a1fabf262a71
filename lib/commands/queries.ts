import { Command } from "commander";
import { readFile } from "fs/promises";
import { performance } from "perf_hooks";
import { z } from "zod";
import { parseList, parseNumber, parsePositiveInt } from "../config.js";
import { SetupError } from "../errors.js";
import { AccountEvent, EventFilter, queryAccountEvents, queryAccountEventsUnion } from "../event-queries.js";
import { formatTable } from "../format.js";
import { saveKeysFile, scanKeyPool } from "../key-pool.js";
import { queryLatestAsOf, queryLatestVersions, queryVersionRange } from "../latest-versions.js";
import { BLOCK_VERSION_INDEX, keyAttributes, TILE_VERSION_INDEX, VOLUME_INDEX } from "../tables.js";
import { commandContext, printResult } from "./context.js";

type ScanSaveFlags = {
  output: string;
  attributes?: string[];
  maxItems: number;
  pageSize: number;
};

export function scanSaveCommand(): Command {
  return new Command("scan-save")
    .description("Scan projected items, drop duplicates and save them as JSON for later benchmarks")
    .option("-o, --output <path>", "File to write", "dynamodb_items.json")
    .option("-a, --attributes <attributes>", "Comma-separated attributes to keep; defaults to the key", parseList)
    .option("--max-items <n>", "Stop scanning after this many items", parsePositiveInt, 1_000_000)
    .option("--page-size <n>", "Items per Scan page", parsePositiveInt, 1_000)
    .action(async (flags: ScanSaveFlags, command: Command) => {
      const ctx = commandContext(command);
      const attributes = flags.attributes ?? (await keyAttributes(ctx.documentClient, ctx.tableName));
      const items = await scanKeyPool(ctx.documentClient, {
        tableName: ctx.tableName,
        attributes,
        maxItems: flags.maxItems,
        pageSize: flags.pageSize,
        pauseMs: 0,
      });
      await saveKeysFile(flags.output, items);
      console.log({ message: "Items saved", path: flags.output, items: items.length });
    });
}

type LatestVersionsFlags = {
  tile: string;
  maxTsver: number;
  stopBelow?: number;
  index: string;
  groupKey: string;
  pageSize: number;
  show: number;
};

export function latestVersionsCommand(): Command {
  return new Command("latest-versions")
    .description("Latest version of every element in a tile, as of a timestamp")
    .requiredOption("--tile <tile>", "Tile to read, as branch#tile")
    .option("--max-tsver <millis>", "Ignore versions newer than this", parseNumber, Date.now())
    .option("--stop-below <millis>", "Stop reading once versions drop below this", parseNumber)
    .option("-i, --index <name>", "Index keyed by tile and version", TILE_VERSION_INDEX)
    .option("--group-key <attribute>", "Attribute that identifies an element", "element")
    .option("--page-size <n>", "Items per Query page", parsePositiveInt, 100)
    .option("--show <n>", "Rows to print", parsePositiveInt, 10)
    .action(async (flags: LatestVersionsFlags, command: Command) => {
      const ctx = commandContext(command);
      const result = await queryLatestVersions(ctx.documentClient, {
        tableName: ctx.tableName,
        indexName: flags.index,
        partitionKeyName: "tile",
        partitionValue: flags.tile,
        sortKeyName: "tsver",
        maxVersion: flags.maxTsver,
        groupKey: flags.groupKey,
        stopBelow: flags.stopBelow,
        pageSize: flags.pageSize,
      });

      for (const line of formatTable(result.items, { priority: [flags.groupKey, "tsver"], limit: flags.show })) {
        console.log(line);
      }
      printResult("Latest versions", {
        tile: flags.tile,
        maxTsver: flags.maxTsver,
        uniqueElements: result.items.length,
        examined: result.examined,
        pages: result.pages,
        stoppedEarly: result.stoppedEarly,
        durationMillis: result.durationMillis,
      });
    });
}

type LatestAsOfFlags = {
  partition: string;
  partitionKey: string;
  sortKey: string;
  asOf: number;
  index?: string;
};

export function latestAsOfCommand(): Command {
  return new Command("latest-as-of")
    .description("The one version of a key with the newest sort key at or before a timestamp")
    .requiredOption("-p, --partition <value>", "Partition key value, such as ele7#col2")
    .option("--partition-key <attribute>", "Partition key attribute", "element_col_id")
    .option("--sort-key <attribute>", "Numeric sort key attribute", "timestamp")
    .option("--as-of <millis>", "Ignore versions newer than this", parseNumber, Date.now())
    .option("-i, --index <name>", "Query this index instead of the table")
    .action(async (flags: LatestAsOfFlags, command: Command) => {
      const ctx = commandContext(command);
      const start = performance.now();
      const item = await queryLatestAsOf(ctx.documentClient, {
        tableName: ctx.tableName,
        indexName: flags.index,
        partitionKeyName: flags.partitionKey,
        partitionValue: flags.partition,
        sortKeyName: flags.sortKey,
        asOf: flags.asOf,
      });
      const durationMillis = performance.now() - start;

      if (item) {
        for (const line of formatTable([item], { priority: [flags.partitionKey, flags.sortKey] })) {
          console.log(line);
        }
      }
      printResult("Latest as of", {
        partition: flags.partition,
        asOf: flags.asOf,
        found: item !== undefined,
        durationMillis,
      });
    });
}

type QueryVersionsFlags = {
  partition: string;
  partitionKey: string;
  sortKey: string;
  maxVersion: number;
  index: string;
  pageSize?: number;
  show: number;
};

export function queryVersionsCommand(): Command {
  return new Command("query-versions")
    .description("Every item of a block up to a version, newest first")
    .requiredOption("-p, --partition <value>", "Partition key value, such as downtown_block_1")
    .option("--partition-key <attribute>", "Partition key attribute of the index", "block")
    .option("--sort-key <attribute>", "Numeric sort key attribute of the index", "version")
    .option("--max-version <n>", "Highest version to include", parseNumber, 20)
    .option("-i, --index <name>", "Index keyed by block and version", BLOCK_VERSION_INDEX)
    .option("--page-size <n>", "Items per Query page", parsePositiveInt)
    .option("--show <n>", "Rows to print", parsePositiveInt, 100)
    .action(async (flags: QueryVersionsFlags, command: Command) => {
      const ctx = commandContext(command);
      const result = await queryVersionRange(ctx.documentClient, {
        tableName: ctx.tableName,
        indexName: flags.index,
        partitionKeyName: flags.partitionKey,
        partitionValue: flags.partition,
        sortKeyName: flags.sortKey,
        maxVersion: flags.maxVersion,
        pageSize: flags.pageSize,
      });

      for (const line of formatTable(result.items, {
        priority: [flags.partitionKey, flags.sortKey, "ele"],
        limit: flags.show,
      })) {
        console.log(line);
      }
      printResult("Version range", {
        partition: flags.partition,
        maxVersion: flags.maxVersion,
        items: result.items.length,
        pages: result.pages,
        durationMillis: result.durationMillis,
      });
    });
}

const EventFilterSchema = z
  .object({
    eventTypes: z.array(z.string()).optional(),
    pairAddresses: z.array(z.string()).optional(),
    tokenAddress: z.string().optional(),
    volumeThreshold: z.number().optional(),
  })
  .strict();

const EventFiltersSchema = z.array(EventFilterSchema).min(1);

/** Parses `--filters`: inline JSON, or `@path` to read it from a file. */
export async function loadEventFilters(value: string): Promise<EventFilter[]> {
  let text = value;
  if (value.startsWith("@")) {
    try {
      text = await readFile(value.slice(1), "utf8");
    } catch (err) {
      throw new SetupError(`Cannot read filters file ${value.slice(1)}`, err);
    }
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new SetupError("Filters are not valid JSON", err);
  }
  const filters = EventFiltersSchema.safeParse(parsed);
  if (!filters.success) {
    const issues = filters.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new SetupError(`Invalid filters: ${issues.join("; ")}`);
  }
  return filters.data;
}

type QueryEventsFlags = {
  account: string;
  eventTypes: string[];
  volumeThreshold: number;
  limit: number;
  index: string;
  filters?: string;
};

export function queryEventsCommand(): Command {
  return new Command("query-events")
    .description("Most recent events of one account, from the volume index or as a union of filtered queries")
    .requiredOption("-a, --account <address>", "Account address")
    .option("-e, --event-types <types>", "Comma-separated event types", parseList, ["SWAP", "ADD_LIQUIDITY"])
    .option("--volume-threshold <n>", "Smallest volume to include", parseNumber, -1)
    .option("-l, --limit <n>", "Events to return", parsePositiveInt, 100)
    .option("-i, --index <name>", "Index keyed by account and volume", VOLUME_INDEX)
    .option("--filters <json>", "JSON list of filters, or @file; runs one query per filter and merges them")
    .action(async (flags: QueryEventsFlags, command: Command) => {
      const ctx = commandContext(command);
      const start = performance.now();

      let events: AccountEvent[];
      if (flags.filters) {
        events = await queryAccountEventsUnion(ctx.documentClient, {
          tableName: ctx.tableName,
          accountAddress: flags.account,
          filters: await loadEventFilters(flags.filters),
          limit: flags.limit,
        });
      } else {
        events = await queryAccountEvents(ctx.documentClient, {
          tableName: ctx.tableName,
          indexName: flags.index,
          accountAddress: flags.account,
          eventTypes: flags.eventTypes,
          volumeThreshold: flags.volumeThreshold,
          limit: flags.limit,
        });
      }
      const durationMillis = performance.now() - start;

      for (const line of formatTable(events, {
        priority: ["block_number", "event_id", "event_type", "volume", "pair_address"],
        limit: flags.limit,
      })) {
        console.log(line);
      }
      printResult("Account events", { account: flags.account, events: events.length, durationMillis });
    });
}
