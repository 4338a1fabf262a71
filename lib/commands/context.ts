import * as ddc from "@aws-sdk/lib-dynamodb";
import { MetricsLogger } from "aws-embedded-metrics";
import { Command } from "commander";
import { createDocumentClient } from "../client.js";
import { SetupError } from "../errors.js";
import { createRunMetrics } from "../metrics.js";

export type GlobalOptions = {
  region: string;
  endpoint?: string;
  local?: boolean;
  table?: string;
  emitMetrics?: boolean;
};

export interface CommandContext {
  options: GlobalOptions;
  tableName: string;
  documentClient: ddc.DynamoDBDocumentClient;
  metrics?: MetricsLogger;
}

export function commandContext(command: Command): CommandContext {
  const options = command.optsWithGlobals<GlobalOptions>();
  if (!options.table) {
    throw new SetupError("No table name given; pass --table or set TABLE_NAME");
  }
  return {
    options,
    tableName: options.table,
    documentClient: createDocumentClient({
      region: options.region,
      endpoint: options.endpoint,
      local: options.local,
    }),
    metrics: options.emitMetrics ? createRunMetrics() : undefined,
  };
}

/**
 * Aborts the returned signal on the first SIGINT or SIGTERM. A second signal
 * falls through to Node's default handling and kills the process.
 */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.log({ message: "Interrupted, finishing in-flight batches", signal });
    controller.abort();
    dispose();
  };
  const dispose = () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return { signal: controller.signal, dispose };
}

export async function withInterrupt<R>(fn: (signal: AbortSignal) => Promise<R>): Promise<R> {
  const { signal, dispose } = interruptSignal();
  try {
    return await fn(signal);
  } finally {
    dispose();
  }
}

export function printResult(message: string, result: unknown) {
  console.log({ message, result });
}
