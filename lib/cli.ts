import { Command } from "commander";
import { Environment } from "./config.js";
import { benchBatchGetCommand, benchQueryCommand, readAfterWriteCommand } from "./commands/bench.js";
import { createTableCommand } from "./commands/create-table.js";
import { insertColumnsCommand, insertCommand, insertElementsCommand, insertEventsCommand } from "./commands/insert.js";
import { purgeCommand } from "./commands/purge.js";
import {
  latestAsOfCommand,
  latestVersionsCommand,
  queryEventsCommand,
  queryVersionsCommand,
  scanSaveCommand,
} from "./commands/queries.js";

export function createProgram(env: Environment): Command {
  return new Command()
    .name("ddb-load")
    .description("Generate load against DynamoDB and measure throughput and latency")
    .version("0.1.0")
    .option("--region <region>", "AWS region", env.AWS_REGION)
    .option("--endpoint <url>", "DynamoDB endpoint override", env.DYNAMODB_ENDPOINT)
    .option("--local", "Use DynamoDB Local on http://localhost:8000 unless --endpoint is given")
    .option("-t, --table <name>", "Table name", env.TABLE_NAME)
    .option("--emit-metrics", "Publish per-batch metrics in CloudWatch embedded metric format")
    .addCommand(createTableCommand())
    .addCommand(insertCommand(env))
    .addCommand(insertEventsCommand())
    .addCommand(insertColumnsCommand())
    .addCommand(insertElementsCommand())
    .addCommand(benchBatchGetCommand())
    .addCommand(benchQueryCommand())
    .addCommand(readAfterWriteCommand())
    .addCommand(scanSaveCommand())
    .addCommand(latestVersionsCommand())
    .addCommand(latestAsOfCommand())
    .addCommand(queryVersionsCommand())
    .addCommand(queryEventsCommand())
    .addCommand(purgeCommand());
}
