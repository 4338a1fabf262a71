import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { SetupError } from "./errors.js";
import { buildLargeAccounts } from "./generators.js";

const AccountsFileSchema = z.array(z.string().min(1)).min(1);

/**
 * Loads the large-account addresses from `path`, or generates `count` new ones
 * and writes them there. Reusing the file keeps later runs and the query
 * commands pointed at the same hot partitions.
 */
export async function loadOrCreateLargeAccounts(path: string, count: number): Promise<string[]> {
  let contents: string | undefined;
  try {
    contents = await readFile(path, "utf8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw new SetupError(`Cannot read accounts file ${path}`, err);
    }
  }

  if (contents === undefined) {
    const accounts = buildLargeAccounts(count);
    await writeFile(path, JSON.stringify(accounts, null, 2));
    console.log({ message: "Generated large accounts", path, accounts });
    return accounts;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (err) {
    throw new SetupError(`Accounts file ${path} is not valid JSON`, err);
  }
  const accounts = AccountsFileSchema.safeParse(parsed);
  if (!accounts.success) {
    throw new SetupError(`Accounts file ${path} must be a non-empty array of addresses`);
  }
  return accounts.data;
}
