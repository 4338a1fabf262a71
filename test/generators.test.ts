import {
  ELEMENT_BLOCKS,
  EVENT_TYPES,
  accountEvent,
  buildLargeAccounts,
  buildPerson,
  columnRecord,
  elementVersionRecord,
  generateAccountEvents,
  generateColumnBatch,
  generateElementVersionBatch,
  generateMapBatch,
  hashedFraction,
  hashedInt,
  mapRecord,
} from "../lib/generators.js";

describe("map records", () => {
  test("every field is derived from the index", () => {
    expect(mapRecord(1234, 1_000_000_000)).toEqual({
      bte: "branch4#t00123#bld0001234",
      tsver: 999_998_766,
      branch: "branch4",
      tile: "branch4#t00123",
      element: "bld0001234",
      element_value: "value_1234",
      element_md5: "9a3f131c9a729d92f6b58cc9ef0f3881",
    });
  });

  test("batches are deterministic for the same offset, size and base time", () => {
    const a = generateMapBatch(500, 25, { baseTime: 1_700_000_000_000 });
    const b = generateMapBatch(500, 25, { baseTime: 1_700_000_000_000 });
    expect(a).toEqual(b);
    expect(a).toHaveLength(25);
    expect(a[0]).toEqual(mapRecord(500, 1_700_000_000_000));
    expect(a[24]).toEqual(mapRecord(524, 1_700_000_000_000));
  });

  test("records within a batch have distinct keys", () => {
    const batch = generateMapBatch(0, 25, { baseTime: 1_700_000_000_000 });
    const keys = new Set(batch.map((record) => `${record.bte}|${record.tsver}`));
    expect(keys.size).toBe(25);
  });

  test("rejects bad offsets and oversized batches", () => {
    expect(() => generateMapBatch(-1, 5, { baseTime: 0 })).toThrow(RangeError);
    expect(() => generateMapBatch(0, 0, { baseTime: 0 })).toThrow("Batch size must be a positive integer, got 0");
    expect(() => generateMapBatch(0, 26, { baseTime: 0, maxBatchSize: 25 })).toThrow(
      "Batch size 26 exceeds the limit of 25",
    );
  });
});

describe("hashed values", () => {
  test("the same seed always gives the same value", () => {
    expect(hashedFraction("ele1#col1#base")).toBe(hashedFraction("ele1#col1#base"));
    expect(hashedInt("ele1#col1#base", 1, 365)).toBe(234);
  });

  test("integers stay within their bounds", () => {
    for (let i = 0; i < 200; i++) {
      const value = hashedInt(`seed-${i}`, 3, 7);
      expect(value).toBeGreaterThanOrEqual(3);
      expect(value).toBeLessThanOrEqual(7);
    }
  });
});

describe("column readings", () => {
  const baseTime = 1_700_000_000_000;

  test("the first record is version 0 of ele1#col1, at its column's base time", () => {
    const record = columnRecord(0, baseTime);
    expect(record).toMatchObject({
      element_col_id: "ele1#col1",
      timestamp: 1_679_782_400_000,
      block_id: "block35",
      element_id: "ele1",
      column_id: "col1",
      status: "MAINTENANCE",
      source: "sensor79",
      is_valid: true,
      last_updated: "2023-03-25T22:13:20.000Z",
    });
    expect(record.metadata).toMatchObject({ unit: "meters", version: 0 });
  });

  test("indexes walk versions, then columns, then elements", () => {
    const record = columnRecord(1234, baseTime);
    expect(record.element_col_id).toBe("ele2#col2");
    expect(record.metadata.version).toBe(34);
    expect(record.timestamp).toBe(1_690_409_634_000);
    expect(record.block_id).toBe("block29");

    const small = { columnsPerElement: 2, versionsPerColumn: 3 };
    expect([0, 2, 3, 5, 6].map((i) => columnRecord(i, baseTime, small).element_col_id)).toEqual([
      "ele1#col1",
      "ele1#col1",
      "ele1#col2",
      "ele1#col2",
      "ele2#col1",
    ]);
  });

  test("versions of a column are one second apart and share a block", () => {
    const [first, second] = generateColumnBatch(200, 2, { baseTime });
    expect(first.element_col_id).toBe(second.element_col_id);
    expect(second.timestamp - first.timestamp).toBe(1_000);
    expect(second.block_id).toBe(first.block_id);
  });

  test("readings stay within their ranges", () => {
    for (const record of generateColumnBatch(0, 25, { baseTime, maxBatchSize: 25 })) {
      expect(record.geo_location.latitude).toBeGreaterThanOrEqual(24);
      expect(record.geo_location.latitude).toBeLessThanOrEqual(49);
      expect(record.geo_location.longitude).toBeGreaterThanOrEqual(-125);
      expect(record.geo_location.longitude).toBeLessThanOrEqual(-66);
      expect(record.geo_location.accuracy).toBeGreaterThanOrEqual(1);
      expect(record.geo_location.accuracy).toBeLessThanOrEqual(10);
      expect(record.metadata.reading).toBeGreaterThanOrEqual(0);
      expect(record.metadata.reading).toBeLessThanOrEqual(100);
      expect(record.timestamp).toBeLessThan(baseTime);
    }
  });

  test("batches are checked like map batches", () => {
    expect(() => generateColumnBatch(0, 26, { baseTime, maxBatchSize: 25 })).toThrow(
      "Batch size 26 exceeds the limit of 25",
    );
  });
});

describe("element versions", () => {
  const baseTime = 1_700_000_000_000;

  test("index 7 is version 2 of element 2", () => {
    const record = elementVersionRecord(7, baseTime);
    expect(record).toMatchObject({
      ele: "element_2_a8b635f2",
      timestamp: 1_699_913_600_000,
      block: "residential_zone_a",
      version: 2,
      status: "maintenance",
    });
    expect(record.geolocation).toMatch(/^-?\d+\.\d{6},-?\d+\.\d{6}$/);
    expect(record.attitude).toBeGreaterThanOrEqual(0);
    expect(record.attitude).toBeLessThanOrEqual(1_000);
  });

  test("an element's versions count up to the newest at the base time", () => {
    const batch = generateElementVersionBatch(0, 3, { baseTime, versionsPerElement: 3 });
    expect(batch.map((record) => record.ele)).toEqual([
      "element_0_04bb229e",
      "element_0_04bb229e",
      "element_0_04bb229e",
    ]);
    expect(batch.map((record) => record.version)).toEqual([1, 2, 3]);
    expect(batch.map((record) => record.timestamp)).toEqual([
      baseTime - 2 * 86_400_000,
      baseTime - 86_400_000,
      baseTime,
    ]);
  });

  test("elements cycle through the ten blocks", () => {
    expect(elementVersionRecord(30, baseTime).ele).toBe("element_10_e6ce6594");
    expect(elementVersionRecord(30, baseTime).block).toBe(ELEMENT_BLOCKS[0]);
    expect(elementVersionRecord(27, baseTime).block).toBe("park_area_h");
  });
});

describe("account events", () => {
  const largeAccounts = buildLargeAccounts(5);

  test("large account addresses are 44 alphanumerics", () => {
    expect(largeAccounts).toHaveLength(5);
    for (const account of largeAccounts) {
      expect(account).toMatch(/^[A-Za-z0-9]{44}$/);
    }
  });

  test("even indexes belong to a large account", () => {
    expect(accountEvent(0, largeAccounts).account_address).toBe(largeAccounts[0]);
    expect(largeAccounts).not.toContain(accountEvent(7, largeAccounts).account_address);
    expect(accountEvent(12, largeAccounts).account_address).toBe(largeAccounts[2]);
  });

  test("events carry their index as event id", () => {
    const events = generateAccountEvents(100, 10, largeAccounts);
    expect(events.map((event) => event.event_id)).toEqual([100, 101, 102, 103, 104, 105, 106, 107, 108, 109]);
    for (const event of events) {
      expect(EVENT_TYPES).toContain(event.event_type);
      expect(event.volume).toBeGreaterThanOrEqual(-10);
      expect(event.volume).toBeLessThanOrEqual(10);
      expect(event.tx_hash).toMatch(/^[0-9a-f]{64}$/);
    }
  });
});

describe("people", () => {
  test("ids are unique and sortable", () => {
    const people = Array.from({ length: 50 }, () => buildPerson(new Date("2024-06-15T00:00:00Z")));
    const ids = people.map((person) => person.id);
    expect(new Set(ids).size).toBe(50);
    expect([...ids].sort()).toEqual(ids);
  });

  test("created_at falls within the year", () => {
    const person = buildPerson(new Date("2024-06-15T00:00:00Z"));
    expect(person.created_at >= "2024-01-01T00:00:00.000Z").toBe(true);
    expect(person.created_at < "2024-06-15T00:00:00.000Z").toBe(true);
    expect(person.age).toBeGreaterThanOrEqual(18);
    expect(person.age).toBeLessThanOrEqual(80);
  });
});
