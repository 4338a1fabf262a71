import { createHash, randomInt } from "crypto";
import { monotonicFactory } from "ulid";

const ulid = monotonicFactory();

// Map records: a fixed grid of branches, tiles and element types. Every field
// is derived from the record index, so a batch can be regenerated on retry or
// after a resume and produce the same keys.

export const BRANCHES = Array.from({ length: 10 }, (_, i) => `branch${i}`);
export const TILES = Array.from({ length: 1_000 }, (_, i) => `t${String(i).padStart(5, "0")}`);
export const ELEMENT_TYPES = ["rd", "poi", "bld", "lnd", "trf"];

const VERSION_WINDOW_MS = 86_400_000;

export interface MapRecord {
  /** Partition key: `branch#tile#element`. */
  bte: string;
  /** Version sort key, a millisecond timestamp. */
  tsver: number;
  branch: string;
  /** `branch#tile`, the partition key of the tile-tsver-index. */
  tile: string;
  element: string;
  element_value: string;
  element_md5: string;
}

export function mapRecord(index: number, baseTime: number): MapRecord {
  const branch = BRANCHES[index % BRANCHES.length];
  const tileBase = TILES[Math.floor(index / 10) % TILES.length];
  const elementType = ELEMENT_TYPES[Math.floor(index / 100) % ELEMENT_TYPES.length];
  const element = `${elementType}${String(index % 1_000_000).padStart(7, "0")}`;
  const elementValue = `value_${index % 10_000_000}`;

  return {
    bte: `${branch}#${tileBase}#${element}`,
    tsver: baseTime - (index % VERSION_WINDOW_MS),
    branch,
    tile: `${branch}#${tileBase}`,
    element,
    element_value: elementValue,
    element_md5: createHash("md5").update(elementValue).digest("hex"),
  };
}

function batchIndexes(offset: number, size: number, maxBatchSize?: number): number[] {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`Offset must be a non-negative integer, got ${offset}`);
  }
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  if (maxBatchSize !== undefined && size > maxBatchSize) {
    throw new RangeError(`Batch size ${size} exceeds the limit of ${maxBatchSize}`);
  }
  return Array.from({ length: size }, (_, i) => offset + i);
}

export function generateMapBatch(
  offset: number,
  size: number,
  opts: { baseTime: number; maxBatchSize?: number },
): MapRecord[] {
  return batchIndexes(offset, size, opts.maxBatchSize).map((index) => mapRecord(index, opts.baseTime));
}

/** A fraction in [0, 1) taken from the first four bytes of the seed's md5. */
export function hashedFraction(seed: string): number {
  return createHash("md5").update(seed).digest().readUInt32BE(0) / 2 ** 32;
}

/** An integer in [min, max], fixed by the seed. */
export function hashedInt(seed: string, min: number, max: number): number {
  return min + Math.floor(hashedFraction(seed) * (max - min + 1));
}

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

const DAY_MS = 86_400_000;

// Column readings: every element has a few columns and every column a run of
// versions one second apart, starting from a base time up to a year back that
// is fixed per column. Keys are `ele<n>#col<m>` with the timestamp as the
// sort key, so "latest as of T" is a single descending query.

export const COLUMN_STATUSES = ["ACTIVE", "INACTIVE", "MAINTENANCE", "PENDING"];

export interface ColumnLayout {
  columnsPerElement: number;
  versionsPerColumn: number;
}

export const DEFAULT_COLUMN_LAYOUT: ColumnLayout = { columnsPerElement: 5, versionsPerColumn: 200 };

export interface ColumnRecord {
  element_col_id: string;
  timestamp: number;
  /** Partition key of the block-timestamp-index, fixed per element. */
  block_id: string;
  element_id: string;
  column_id: string;
  status: string;
  geo_location: { latitude: number; longitude: number; accuracy: number };
  metadata: { reading: number; unit: string; quality: number; version: number };
  source: string;
  is_valid: boolean;
  last_updated: string;
}

export function columnRecord(
  index: number,
  baseTime: number,
  layout: ColumnLayout = DEFAULT_COLUMN_LAYOUT,
): ColumnRecord {
  const perElement = layout.columnsPerElement * layout.versionsPerColumn;
  const element = Math.floor(index / perElement) + 1;
  const column = (Math.floor(index / layout.versionsPerColumn) % layout.columnsPerElement) + 1;
  const version = index % layout.versionsPerColumn;

  const elementId = `ele${element}`;
  const columnKey = `${elementId}#col${column}`;
  const versionSeed = `${columnKey}#${version}`;
  const timestamp = baseTime - hashedInt(`${columnKey}#base`, 1, 365) * DAY_MS + version * 1_000;

  return {
    element_col_id: columnKey,
    timestamp,
    block_id: `block${hashedInt(`${elementId}#block`, 1, 50)}`,
    element_id: elementId,
    column_id: `col${column}`,
    status: COLUMN_STATUSES[hashedInt(`${versionSeed}#status`, 0, COLUMN_STATUSES.length - 1)],
    geo_location: {
      latitude: round(24 + 25 * hashedFraction(`${versionSeed}#lat`), 6),
      longitude: round(-125 + 59 * hashedFraction(`${versionSeed}#lon`), 6),
      accuracy: round(1 + 9 * hashedFraction(`${versionSeed}#accuracy`), 2),
    },
    metadata: {
      reading: round(100 * hashedFraction(`${versionSeed}#reading`), 2),
      unit: "meters",
      quality: round(hashedFraction(`${versionSeed}#quality`), 2),
      version,
    },
    source: `sensor${hashedInt(`${versionSeed}#source`, 1, 100)}`,
    is_valid: hashedFraction(`${versionSeed}#valid`) < 0.9,
    last_updated: new Date(timestamp).toISOString(),
  };
}

export function generateColumnBatch(
  offset: number,
  size: number,
  opts: { baseTime: number; layout?: ColumnLayout; maxBatchSize?: number },
): ColumnRecord[] {
  return batchIndexes(offset, size, opts.maxBatchSize).map((index) => columnRecord(index, opts.baseTime, opts.layout));
}

// Element versions: each element gets a fixed number of numbered versions a
// day apart, the newest at the base time. Elements are spread over ten blocks
// so the block-version-index has a handful of wide partitions.

export const ELEMENT_BLOCKS = [
  "downtown_block_1",
  "downtown_block_2",
  "residential_zone_a",
  "industrial_area_b",
  "commercial_district_c",
  "suburban_area_d",
  "historic_district_e",
  "waterfront_zone_f",
  "university_campus_g",
  "park_area_h",
];

export const ELEMENT_STATUSES = ["active", "inactive", "under_construction", "maintenance", "planned"];

export interface ElementVersionRecord {
  ele: string;
  timestamp: number;
  block: string;
  version: number;
  status: string;
  attitude: number;
  /** `latitude,longitude` with six decimals each. */
  geolocation: string;
}

export function elementVersionRecord(index: number, baseTime: number, versionsPerElement = 3): ElementVersionRecord {
  const element = Math.floor(index / versionsPerElement);
  const version = (index % versionsPerElement) + 1;
  const ele = `element_${element}_${createHash("md5").update(`element_${element}`).digest("hex").slice(0, 8)}`;
  const seed = `${ele}#${version}`;
  const latitude = -90 + 180 * hashedFraction(`${seed}#lat`);
  const longitude = -180 + 360 * hashedFraction(`${seed}#lon`);

  return {
    ele,
    timestamp: baseTime - (versionsPerElement - version) * DAY_MS,
    block: ELEMENT_BLOCKS[element % ELEMENT_BLOCKS.length],
    version,
    status: ELEMENT_STATUSES[hashedInt(`${seed}#status`, 0, ELEMENT_STATUSES.length - 1)],
    attitude: round(1_000 * hashedFraction(`${seed}#attitude`), 2),
    geolocation: `${latitude.toFixed(6)},${longitude.toFixed(6)}`,
  };
}

export function generateElementVersionBatch(
  offset: number,
  size: number,
  opts: { baseTime: number; versionsPerElement?: number; maxBatchSize?: number },
): ElementVersionRecord[] {
  return batchIndexes(offset, size, opts.maxBatchSize).map((index) =>
    elementVersionRecord(index, opts.baseTime, opts.versionsPerElement),
  );
}

// Event log records: random trading events where every second event belongs
// to one of a handful of "large" accounts, so that per-account queries have
// hot partitions to work against.

export const EVENT_TYPES = ["SWAP", "ADD_LIQUIDITY", "REMOVE_LIQUIDITY"];

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const HEX = "0123456789abcdef";
const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";

export interface AccountEventRecord {
  account_address: string;
  block_number: number;
  event_id: number;
  date: string;
  event_type: string;
  token_account_address: string;
  token_address: string;
  opponent_address: string;
  tx_hash: string;
  block_time: number;
  amount: string;
  flow_type: number;
  amm: string;
  pair_address: string;
  volume: number;
  is_target: boolean;
  tx_seq: number;
}

function randomString(alphabet: string, length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += alphabet[randomInt(alphabet.length)];
  }
  return out;
}

export function randomAccountAddress(): string {
  return randomString(ALPHANUMERIC, 44);
}

export function buildLargeAccounts(count: number): string[] {
  return Array.from({ length: count }, () => randomAccountAddress());
}

export function accountEvent(index: number, largeAccounts: readonly string[]): AccountEventRecord {
  const accountAddress =
    index % 2 === 0 && largeAccounts.length > 0 ? largeAccounts[index % largeAccounts.length] : randomAccountAddress();
  const month = String(randomInt(1, 13)).padStart(2, "0");
  const day = String(randomInt(1, 29)).padStart(2, "0");

  return {
    account_address: accountAddress,
    block_number: randomInt(0, 2 ** 31 - 1),
    event_id: index,
    date: `2023-${month}-${day}`,
    event_type: EVENT_TYPES[randomInt(EVENT_TYPES.length)],
    token_account_address: randomAccountAddress(),
    token_address: randomAccountAddress(),
    opponent_address: randomAccountAddress(),
    tx_hash: randomString(HEX, 64),
    block_time: Date.now() * 1_000,
    amount: (Math.random() * 1_000).toFixed(6),
    flow_type: randomInt(0, 3),
    amm: randomString(LOWERCASE, 10),
    pair_address: randomAccountAddress(),
    volume: Number((Math.random() * 20 - 10).toFixed(6)),
    is_target: randomInt(2) === 1,
    tx_seq: randomInt(1, 1_001),
  };
}

export function generateAccountEvents(
  offset: number,
  size: number,
  largeAccounts: readonly string[],
): AccountEventRecord[] {
  return Array.from({ length: size }, (_, i) => accountEvent(offset + i, largeAccounts));
}

// Person records for single-item read-after-write latency tests.

const FIRST_NAMES = ["Ada", "Grace", "Alan", "Edsger", "Barbara", "Ken", "Margaret", "Dennis"];
const LAST_NAMES = ["Lovelace", "Hopper", "Turing", "Dijkstra", "Liskov", "Thompson", "Hamilton", "Ritchie"];
const CITIES = ["Lisbon", "Osaka", "Toronto", "Nairobi", "Lyon", "Austin", "Seoul", "Perth"];
const COUNTRIES = ["Portugal", "Japan", "Canada", "Kenya", "France", "United States", "South Korea", "Australia"];
const JOBS = ["Engineer", "Analyst", "Designer", "Teacher", "Nurse", "Pilot", "Chef", "Librarian"];

export interface PersonRecord {
  id: string;
  name: string;
  email: string;
  age: number;
  city: string;
  country: string;
  job: string;
  phone: string;
  created_at: string;
  is_active: boolean;
}

function pick<T>(values: readonly T[]): T {
  return values[randomInt(values.length)];
}

export function buildPerson(now: Date = new Date()): PersonRecord {
  const first = pick(FIRST_NAMES);
  const last = pick(LAST_NAMES);
  const id = ulid();
  const yearStart = Date.UTC(now.getUTCFullYear(), 0, 1);

  return {
    id,
    name: `${first} ${last}`,
    email: `${first}.${last}.${id.slice(-6)}@example.com`.toLowerCase(),
    age: randomInt(18, 81),
    city: pick(CITIES),
    country: pick(COUNTRIES),
    job: pick(JOBS),
    phone: `+1-555-${String(randomInt(0, 10_000)).padStart(4, "0")}`,
    created_at: new Date(yearStart + Math.floor(Math.random() * Math.max(now.getTime() - yearStart, 1))).toISOString(),
    is_active: randomInt(2) === 1,
  };
}
