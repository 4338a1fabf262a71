import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadOrCreateLargeAccounts } from "../lib/accounts.js";
import { SetupError } from "../lib/errors.js";

describe("loadOrCreateLargeAccounts", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "accounts-"));
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test("generates and saves accounts the first time, then reuses them", async () => {
    const path = join(dir, "large_accounts.json");

    const created = await loadOrCreateLargeAccounts(path, 5);
    expect(created).toHaveLength(5);
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual(created);

    await expect(loadOrCreateLargeAccounts(path, 3)).resolves.toEqual(created);
  });

  test("an empty file is refused", async () => {
    const path = join(dir, "large_accounts.json");
    await writeFile(path, "[]");

    await expect(loadOrCreateLargeAccounts(path, 5)).rejects.toThrow(
      new SetupError(`Accounts file ${path} must be a non-empty array of addresses`),
    );
  });

  test("a file that is not JSON is refused", async () => {
    const path = join(dir, "large_accounts.json");
    await writeFile(path, "0xabc\n0xdef\n");

    await expect(loadOrCreateLargeAccounts(path, 5)).rejects.toBeInstanceOf(SetupError);
  });
});
