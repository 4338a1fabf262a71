import * as ddc from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import { Item, queryPages, uniqueBy } from "./scan.js";

export const AccountEventSchema = z
  .object({
    account_address: z.string(),
    block_number: z.number(),
    event_id: z.number(),
    event_type: z.string(),
    volume: z.number(),
  })
  .passthrough();

export type AccountEvent = z.infer<typeof AccountEventSchema>;

/** Newest block first; ties broken by event id, also descending. */
export function compareEventsDescending(a: AccountEvent, b: AccountEvent): number {
  return b.block_number - a.block_number || b.event_id - a.event_id;
}

export interface EventFilter {
  eventTypes?: string[];
  pairAddresses?: string[];
  tokenAddress?: string;
  volumeThreshold?: number;
}

export interface FilterExpression {
  FilterExpression?: string;
  ExpressionAttributeNames: Record<string, string>;
  ExpressionAttributeValues: Record<string, unknown>;
}

/** Builds an AND of the filter's clauses, with placeholders prefixed by `prefix`. */
export function buildEventFilter(filter: EventFilter, prefix = "f"): FilterExpression {
  const clauses: string[] = [];
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};

  const inClause = (attribute: string, tag: string, options: string[]) => {
    names[`#${prefix}${tag}`] = attribute;
    const placeholders = options.map((option, i) => {
      values[`:${prefix}${tag}${i}`] = option;
      return `:${prefix}${tag}${i}`;
    });
    clauses.push(`#${prefix}${tag} IN (${placeholders.join(", ")})`);
  };

  if (filter.pairAddresses && filter.pairAddresses.length > 0) {
    inClause("pair_address", "pa", filter.pairAddresses);
  }
  if (filter.tokenAddress !== undefined) {
    names[`#${prefix}ta`] = "token_address";
    values[`:${prefix}ta`] = filter.tokenAddress;
    clauses.push(`#${prefix}ta = :${prefix}ta`);
  }
  if (filter.eventTypes && filter.eventTypes.length > 0) {
    inClause("event_type", "et", filter.eventTypes);
  }
  if (filter.volumeThreshold !== undefined) {
    names[`#${prefix}vo`] = "volume";
    values[`:${prefix}vo`] = filter.volumeThreshold;
    clauses.push(`#${prefix}vo >= :${prefix}vo`);
  }

  return {
    FilterExpression: clauses.length > 0 ? clauses.join(" AND ") : undefined,
    ExpressionAttributeNames: names,
    ExpressionAttributeValues: values,
  };
}

export function parseEvents(items: Item[]): AccountEvent[] {
  return items.map((item) => AccountEventSchema.parse(item));
}

export interface AccountEventsQuery {
  tableName: string;
  /** Index keyed by account_address with volume as the sort key. */
  indexName: string;
  accountAddress: string;
  eventTypes: string[];
  volumeThreshold: number;
  limit: number;
}

/**
 * Events for one account with volume at or above the threshold, read from the
 * volume index largest first a whole page at a time until at least `limit`
 * matching events are in hand, then re-ordered by block and cut to `limit`.
 */
export async function queryAccountEvents(
  documentClient: ddc.DynamoDBDocumentClient,
  query: AccountEventsQuery,
): Promise<AccountEvent[]> {
  const filter = buildEventFilter({ eventTypes: query.eventTypes });
  const pages = queryPages(documentClient, {
    TableName: query.tableName,
    IndexName: query.indexName,
    KeyConditionExpression: "#acct = :acct AND #vol >= :vol",
    FilterExpression: filter.FilterExpression,
    ExpressionAttributeNames: { ...filter.ExpressionAttributeNames, "#acct": "account_address", "#vol": "volume" },
    ExpressionAttributeValues: {
      ...filter.ExpressionAttributeValues,
      ":acct": query.accountAddress,
      ":vol": query.volumeThreshold,
    },
    ScanIndexForward: false,
  });

  const events: AccountEvent[] = [];
  for await (const page of pages) {
    events.push(...parseEvents(page));
    if (events.length >= query.limit) {
      break;
    }
  }
  return events.sort(compareEventsDescending).slice(0, query.limit);
}

export interface AccountEventsUnionQuery {
  tableName: string;
  accountAddress: string;
  filters: EventFilter[];
  limit: number;
}

/**
 * Runs one query per filter against the base table, newest first, each capped
 * at `limit`, and merges the results. An event matched by more than one
 * filter appears once.
 */
export async function queryAccountEventsUnion(
  documentClient: ddc.DynamoDBDocumentClient,
  query: AccountEventsUnionQuery,
): Promise<AccountEvent[]> {
  const results = await Promise.all(
    query.filters.map(async (eventFilter, i) => {
      const filter = buildEventFilter(eventFilter, `q${i}`);
      const page = await documentClient.send(
        new ddc.QueryCommand({
          TableName: query.tableName,
          KeyConditionExpression: "#acct = :acct",
          FilterExpression: filter.FilterExpression,
          ExpressionAttributeNames: { ...filter.ExpressionAttributeNames, "#acct": "account_address" },
          ExpressionAttributeValues: { ...filter.ExpressionAttributeValues, ":acct": query.accountAddress },
          ScanIndexForward: false,
          Limit: query.limit,
        }),
      );
      return parseEvents(page.Items ?? []);
    }),
  );

  return uniqueBy(results.flat(), (event) => String(event.event_id))
    .sort(compareEventsDescending)
    .slice(0, query.limit);
}
