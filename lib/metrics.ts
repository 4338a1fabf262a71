import { Configuration, createMetricsLogger, MetricsLogger, StorageResolution, Unit } from "aws-embedded-metrics";

export const METRIC_NAMESPACE = "DynamoDBLoad";

export type MetricNames =
  | "Success" // overall success (1) / failure (0) of a single batch or iteration
  | "Latency" // elapsed time from the first attempt to the final outcome
  | "BatchSize"; // number of items in the batch or iteration

const METRICS_RESOLUTION = StorageResolution.High;

export function createRunMetrics(): MetricsLogger {
  Configuration.namespace = METRIC_NAMESPACE;
  return createMetricsLogger();
}

/** Emits one data point per metric for a finished unit of work; a no-op without a logger. */
export async function emitUnitOfWork(
  metrics: MetricsLogger | undefined,
  name: string,
  unit: { success: boolean; latencyMs: number; batchSize: number },
): Promise<void> {
  if (!metrics) {
    return;
  }
  metrics.putDimensions({ Name: name });
  metrics.putMetric($m("Success"), unit.success ? 1 : 0, Unit.None, METRICS_RESOLUTION);
  metrics.putMetric($m("Latency"), unit.latencyMs, Unit.Milliseconds, METRICS_RESOLUTION);
  metrics.putMetric($m("BatchSize"), unit.batchSize, Unit.Count, METRICS_RESOLUTION);
  await metrics.flush();
}

function $m(metric: MetricNames) {
  return metric;
}
