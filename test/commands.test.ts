import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { pickAttributes } from "../lib/commands/bench.js";
import { loadEventFilters } from "../lib/commands/queries.js";
import { SetupError } from "../lib/errors.js";

describe("pickAttributes", () => {
  test("keeps only the key attributes", () => {
    expect(pickAttributes({ bte: "b1", tsver: 7, value: 3 }, ["bte", "tsver"])).toEqual({ bte: "b1", tsver: 7 });
  });

  test("an item without a key attribute cannot be used as a key", () => {
    expect(() => pickAttributes({ bte: "b1" }, ["bte", "tsver"])).toThrow(
      new SetupError('Key item is missing attribute tsver: {"bte":"b1"}'),
    );
  });
});

describe("loadEventFilters", () => {
  test("parses inline JSON", async () => {
    await expect(loadEventFilters('[{"eventTypes":["SWAP"]},{"tokenAddress":"token-1"}]')).resolves.toEqual([
      { eventTypes: ["SWAP"] },
      { tokenAddress: "token-1" },
    ]);
  });

  test("reads @file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "filters-"));
    try {
      const path = join(dir, "filters.json");
      await writeFile(path, '[{"volumeThreshold":10}]');

      await expect(loadEventFilters(`@${path}`)).resolves.toEqual([{ volumeThreshold: 10 }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("unknown fields are refused", async () => {
    await expect(loadEventFilters('[{"eventType":"SWAP"}]')).rejects.toThrow(/^Invalid filters: 0: /);
  });

  test("an empty list is refused", async () => {
    await expect(loadEventFilters("[]")).rejects.toBeInstanceOf(SetupError);
  });

  test("text that is not JSON is refused", async () => {
    await expect(loadEventFilters("SWAP")).rejects.toThrow(new SetupError("Filters are not valid JSON"));
  });
});
