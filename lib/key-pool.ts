import * as ddc from "@aws-sdk/lib-dynamodb";
import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { SetupError } from "./errors.js";
import { Item, collect, flattenPages, scanPages, uniqueBy } from "./scan.js";
import { projectionExpression } from "./targets.js";

const KeysFileSchema = z.array(z.record(z.unknown()));

export interface KeyPoolOptions {
  tableName: string;
  attributes: string[];
  maxItems: number;
  pageSize?: number;
  pauseMs?: number;
}

/** Canonical string for a projected item, attribute order included. */
export function keyOf(item: Item, attributes: string[]): string {
  return JSON.stringify(attributes.map((attribute) => item[attribute]));
}

/**
 * Scans up to `maxItems` items projected to `attributes` and removes
 * duplicates. An empty result is a setup failure: there is nothing to read.
 */
export async function scanKeyPool(documentClient: ddc.DynamoDBDocumentClient, opts: KeyPoolOptions): Promise<Item[]> {
  console.log({ message: "Scanning table for keys", tableName: opts.tableName, attributes: opts.attributes });
  let scanned = 0;
  const items = await collect(
    flattenPages(
      logged(
        scanPages(
          documentClient,
          { TableName: opts.tableName, Limit: opts.pageSize ?? 1_000, ...projectionExpression(opts.attributes) },
          { maxItems: opts.maxItems, pauseMs: opts.pauseMs ?? 100 },
        ),
        (page) => {
          scanned += page.length;
          console.log({ message: `Scanned ${scanned.toLocaleString("en-US")} items` });
        },
      ),
    ),
  );

  const unique = uniqueBy(items, (item) => keyOf(item, opts.attributes));
  console.log({ message: "Scan complete", scanned: items.length, unique: unique.length });
  if (unique.length === 0) {
    throw new SetupError(`No items found in table ${opts.tableName}`);
  }
  return unique;
}

async function* logged<T>(pages: AsyncIterable<T[]>, onPage: (page: T[]) => void): AsyncGenerator<T[]> {
  for await (const page of pages) {
    onPage(page);
    yield page;
  }
}

export async function saveKeysFile(path: string, items: Item[]): Promise<void> {
  await writeFile(path, JSON.stringify(items));
}

export async function loadKeysFile(path: string): Promise<Item[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new SetupError(`Cannot read keys file ${path}`, err);
  }
  const keys = KeysFileSchema.safeParse(parsed);
  if (!keys.success) {
    throw new SetupError(`Keys file ${path} is not an array of objects`);
  }
  if (keys.data.length === 0) {
    throw new SetupError(`Keys file ${path} is empty`);
  }
  return keys.data;
}
