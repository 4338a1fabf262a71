import { Command, Option } from "commander";
import { createTable, TABLE_SCHEMA_NAMES, TableSchema } from "../tables.js";
import { commandContext } from "./context.js";

type CreateTableFlags = {
  schema: TableSchema;
  recreate?: boolean;
};

export function createTableCommand(): Command {
  return new Command("create-table")
    .description("Create an on-demand table with the key layout the load commands expect")
    .addOption(
      new Option("-s, --schema <schema>", "Key layout to create").choices(TABLE_SCHEMA_NAMES).default("map"),
    )
    .option("--recreate", "Delete and re-create the table if it already exists")
    .action(async (flags: CreateTableFlags, command: Command) => {
      const ctx = commandContext(command);
      await createTable(ctx.documentClient, ctx.tableName, flags.schema, { recreateIfExists: flags.recreate ?? false });
    });
}
