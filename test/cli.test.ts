import { Command, CommanderError } from "commander";
import { createProgram } from "../lib/cli.js";
import { loadEnvironment } from "../lib/config.js";
import { SetupError } from "../lib/errors.js";

function program(): Command {
  const silent = { writeOut: () => {}, writeErr: () => {} };
  const root = createProgram(loadEnvironment({})).exitOverride().configureOutput(silent);
  for (const command of root.commands) {
    command.exitOverride().configureOutput(silent);
  }
  return root;
}

describe("ddb-load", () => {
  test("registers every command", () => {
    expect(program().commands.map((command) => command.name())).toEqual([
      "create-table",
      "insert",
      "insert-events",
      "insert-columns",
      "insert-elements",
      "bench-batch-get",
      "bench-query",
      "read-after-write",
      "scan-save",
      "latest-versions",
      "latest-as-of",
      "query-versions",
      "query-events",
      "purge",
    ]);
  });

  test("a batch larger than one request is rejected before anything runs", async () => {
    await expect(program().parseAsync(["-t", "maps", "insert", "--batch-size", "26"], { from: "user" })).rejects.toThrow(
      "error: option '-b, --batch-size <n>' argument '26' is invalid. At most 25 items fit in one request.",
    );
  });

  test("purge refuses to run without confirmation", async () => {
    await expect(program().parseAsync(["-t", "maps", "purge"], { from: "user" })).rejects.toThrow(
      new CommanderError(1, "commander.error", "Refusing to delete every item without --yes"),
    );
  });

  test("resuming an event insert needs a checkpoint file", async () => {
    await expect(program().parseAsync(["-t", "events", "insert-events", "--resume"], { from: "user" })).rejects.toThrow(
      new CommanderError(1, "commander.error", "--resume needs --checkpoint-file"),
    );
  });

  test("commands that touch a table need its name", async () => {
    await expect(program().parseAsync(["purge", "--yes"], { from: "user" })).rejects.toThrow(
      new SetupError("No table name given; pass --table or set TABLE_NAME"),
    );
  });

  test("an index query needs the index's partition key", async () => {
    await expect(
      program().parseAsync(["--local", "-t", "maps", "bench-query", "--index", "tile-tsver-index"], { from: "user" }),
    ).rejects.toThrow("--partition-key is required with --index");
  });
});
