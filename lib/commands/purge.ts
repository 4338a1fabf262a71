import { Command } from "commander";
import { HarnessFlags, backoffFromFlags, withHarnessOptions } from "../config.js";
import { purgeTable } from "../purge.js";
import { MAX_BATCH_WRITE_ITEMS } from "../targets.js";
import { commandContext, printResult, withInterrupt } from "./context.js";

type PurgeFlags = HarnessFlags & {
  yes?: boolean;
};

export function purgeCommand(): Command {
  return withHarnessOptions(new Command("purge"), MAX_BATCH_WRITE_ITEMS, 10)
    .description("Delete every item in the table")
    .option("-y, --yes", "Confirm the deletion")
    .action(async (flags: PurgeFlags, command: Command) => {
      if (!flags.yes) {
        command.error("Refusing to delete every item without --yes");
      }
      const ctx = commandContext(command);
      const result = await withInterrupt((signal) =>
        purgeTable(ctx.documentClient, ctx.tableName, {
          concurrency: flags.concurrency,
          batchSize: flags.batchSize,
          maxAttempts: flags.maxAttempts,
          backoff: backoffFromFlags(flags),
          signal,
          metrics: ctx.metrics,
        }),
      );
      printResult("Purge finished", result);
    });
}
