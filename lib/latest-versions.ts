import * as ddc from "@aws-sdk/lib-dynamodb";
import { Item, flattenPages, queryPages } from "./scan.js";

export interface FirstPerGroupOptions {
  groupKey: string;
  versionKey: string;
  /** Stop consuming the source at the first version strictly below this value. */
  stopBelow?: number;
}

export interface FirstPerGroupResult<T> {
  items: T[];
  /** Items read from the source, including the one that triggered an early stop. */
  examined: number;
  stoppedEarly: boolean;
}

/**
 * Keeps the first item seen for each group. Fed with items sorted by version
 * descending, that first item is the group's latest version.
 *
 * Versions are numbers. An item whose version attribute is anything else is
 * rejected rather than coerced.
 */
export async function firstPerGroup<T extends Item>(
  source: Iterable<T> | AsyncIterable<T>,
  opts: FirstPerGroupOptions,
): Promise<FirstPerGroupResult<T>> {
  const seen = new Set<string>();
  const items: T[] = [];
  let examined = 0;

  for await (const item of source) {
    examined += 1;
    const version = item[opts.versionKey];
    if (typeof version !== "number" || !Number.isFinite(version)) {
      throw new TypeError(`Item has non-numeric ${opts.versionKey}: ${JSON.stringify(version)}`);
    }
    if (opts.stopBelow !== undefined && version < opts.stopBelow) {
      return { items, examined, stoppedEarly: true };
    }

    const group = item[opts.groupKey];
    if (typeof group !== "string" && typeof group !== "number") {
      throw new TypeError(`Item has no usable ${opts.groupKey}`);
    }
    const groupId = String(group);
    if (!seen.has(groupId)) {
      seen.add(groupId);
      items.push(item);
    }
  }

  return { items, examined, stoppedEarly: false };
}

export interface LatestVersionsQuery {
  tableName: string;
  indexName: string;
  partitionKeyName: string;
  partitionValue: string;
  sortKeyName: string;
  maxVersion: number;
  groupKey: string;
  stopBelow?: number;
  pageSize?: number;
}

export interface LatestVersionsResult extends FirstPerGroupResult<Item> {
  pages: number;
  durationMillis: number;
}

interface VersionKeyQuery {
  tableName: string;
  /** Omit to read the table's own key. */
  indexName?: string;
  partitionKeyName: string;
  partitionValue: string;
  sortKeyName: string;
}

function versionsAtOrBelow(query: VersionKeyQuery, maxVersion: number): ddc.QueryCommandInput {
  return {
    TableName: query.tableName,
    IndexName: query.indexName,
    KeyConditionExpression: "#pk = :pk AND #sk <= :max",
    ExpressionAttributeNames: { "#pk": query.partitionKeyName, "#sk": query.sortKeyName },
    ExpressionAttributeValues: { ":pk": query.partitionValue, ":max": maxVersion },
    ScanIndexForward: false,
  };
}

async function* countPages(source: AsyncIterable<Item[]>, onPage: () => void): AsyncGenerator<Item[]> {
  for await (const page of source) {
    onPage();
    yield page;
  }
}

/**
 * Latest version of every group in a partition, as of `maxVersion`. The index
 * is read newest first and pagination stops as soon as `stopBelow` is crossed.
 */
export async function queryLatestVersions(
  documentClient: ddc.DynamoDBDocumentClient,
  query: LatestVersionsQuery,
): Promise<LatestVersionsResult> {
  const startTime = Date.now();
  let pages = 0;

  const source = queryPages(documentClient, { ...versionsAtOrBelow(query, query.maxVersion), Limit: query.pageSize });
  const result = await firstPerGroup(
    flattenPages(
      countPages(source, () => {
        pages += 1;
      }),
    ),
    {
      groupKey: query.groupKey,
      versionKey: query.sortKeyName,
      stopBelow: query.stopBelow,
    },
  );

  return { ...result, pages, durationMillis: Date.now() - startTime };
}

export interface LatestAsOfQuery extends VersionKeyQuery {
  asOf: number;
}

/** The one item with the largest sort key at or below `asOf`, if any. */
export async function queryLatestAsOf(
  documentClient: ddc.DynamoDBDocumentClient,
  query: LatestAsOfQuery,
): Promise<Item | undefined> {
  const result = await documentClient.send(new ddc.QueryCommand({ ...versionsAtOrBelow(query, query.asOf), Limit: 1 }));
  return result.Items?.[0];
}

export interface VersionRangeQuery extends VersionKeyQuery {
  maxVersion: number;
  pageSize?: number;
}

export interface VersionRangeResult {
  /** Newest first. */
  items: Item[];
  pages: number;
  durationMillis: number;
}

/** Every item in a partition with a sort key at or below `maxVersion`. */
export async function queryVersionRange(
  documentClient: ddc.DynamoDBDocumentClient,
  query: VersionRangeQuery,
): Promise<VersionRangeResult> {
  const startTime = Date.now();
  const items: Item[] = [];
  let pages = 0;

  for await (const page of queryPages(documentClient, {
    ...versionsAtOrBelow(query, query.maxVersion),
    Limit: query.pageSize,
  })) {
    pages += 1;
    items.push(...page);
  }

  return { items, pages, durationMillis: Date.now() - startTime };
}
