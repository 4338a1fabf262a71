import * as ddc from "@aws-sdk/lib-dynamodb";
import { setTimeout as sleep } from "timers/promises";

export type Item = Record<string, unknown>;

export interface PageOptions {
  /** Stop paginating once this many items have been yielded. */
  maxItems?: number;
  /** Pause between pages to ease read pressure on the table. */
  pauseMs?: number;
}

/**
 * Yields Scan pages, following `LastEvaluatedKey` until the table is
 * exhausted. The last page is trimmed so no more than `maxItems` come out.
 */
export async function* scanPages(
  documentClient: ddc.DynamoDBDocumentClient,
  input: ddc.ScanCommandInput,
  opts: PageOptions = {},
): AsyncGenerator<Item[]> {
  let exclusiveStartKey = input.ExclusiveStartKey;
  let yielded = 0;

  do {
    const page = await documentClient.send(new ddc.ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));
    const items = trimPage(page.Items ?? [], yielded, opts.maxItems);
    yielded += items.length;
    yield items;

    exclusiveStartKey = page.LastEvaluatedKey;
    if (exclusiveStartKey && opts.pauseMs) {
      await sleep(opts.pauseMs);
    }
  } while (exclusiveStartKey && !reachedLimit(yielded, opts.maxItems));
}

/** Same pagination as `scanPages`, over Query. */
export async function* queryPages(
  documentClient: ddc.DynamoDBDocumentClient,
  input: ddc.QueryCommandInput,
  opts: PageOptions = {},
): AsyncGenerator<Item[]> {
  let exclusiveStartKey = input.ExclusiveStartKey;
  let yielded = 0;

  do {
    const page = await documentClient.send(new ddc.QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));
    const items = trimPage(page.Items ?? [], yielded, opts.maxItems);
    yielded += items.length;
    yield items;

    exclusiveStartKey = page.LastEvaluatedKey;
    if (exclusiveStartKey && opts.pauseMs) {
      await sleep(opts.pauseMs);
    }
  } while (exclusiveStartKey && !reachedLimit(yielded, opts.maxItems));
}

export async function* flattenPages<T>(pages: AsyncIterable<T[]>): AsyncGenerator<T> {
  for await (const page of pages) {
    yield* page;
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

export async function scanAll(
  documentClient: ddc.DynamoDBDocumentClient,
  input: ddc.ScanCommandInput,
  opts: PageOptions = {},
): Promise<Item[]> {
  return collect(flattenPages(scanPages(documentClient, input, opts)));
}

/** Drops repeats, keeping the first occurrence of each key in input order. */
export function uniqueBy<T>(items: Iterable<T>, key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of items) {
    const k = key(item);
    if (!seen.has(k)) {
      seen.add(k);
      out.push(item);
    }
  }
  return out;
}

function trimPage(items: Item[], alreadyYielded: number, maxItems: number | undefined): Item[] {
  return maxItems === undefined ? items : items.slice(0, Math.max(maxItems - alreadyYielded, 0));
}

function reachedLimit(yielded: number, maxItems: number | undefined): boolean {
  return maxItems !== undefined && yielded >= maxItems;
}
