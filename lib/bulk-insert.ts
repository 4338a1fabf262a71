import { BatchHarness, HarnessOptions, HarnessResult } from "./batch-harness.js";
import { CheckpointStore } from "./checkpoint.js";
import { ProgressSample, ThroughputReporter } from "./reporter.js";

export interface BulkInsertOptions<T> extends Omit<HarnessOptions<T>, "startOffset"> {
  checkpoint?: CheckpointStore;
  /** Start from the stored checkpoint instead of offset zero. */
  resume?: boolean;
  reportIntervalMs?: number;
  onProgress?: (sample: ProgressSample) => void;
}

export interface BulkInsertResult extends HarnessResult {
  resumedFrom: number;
  finalProgress: ProgressSample;
}

/**
 * Runs a harness with a progress reporter alongside it. The reporter's last
 * tick happens after the workers drain, so the checkpoint always reflects the
 * final watermark, including after an interrupt.
 */
export async function runBulkInsert<T>(opts: BulkInsertOptions<T>): Promise<BulkInsertResult> {
  const { checkpoint, resume, reportIntervalMs, onProgress, ...harnessOptions } = opts;

  const resumedFrom = resume && checkpoint ? ((await checkpoint.load()) ?? 0) : 0;
  const startOffset = Math.min(resumedFrom, opts.totalItems);
  if (resumedFrom > 0) {
    console.log({ message: `Resuming from index ${startOffset.toLocaleString("en-US")}` });
  }

  const harness = new BatchHarness({ ...harnessOptions, startOffset });
  const reporter = new ThroughputReporter({
    read: () => harness.counters.snapshot(),
    targetItems: opts.totalItems - startOffset,
    intervalMs: reportIntervalMs,
    checkpoint,
    log: onProgress,
  });

  reporter.start();
  let result: HarnessResult;
  let finalProgress: ProgressSample;
  try {
    result = await harness.run();
  } finally {
    // Flush the checkpoint even when the harness throws.
    finalProgress = await reporter.stop();
  }

  return { ...result, resumedFrom: startOffset, finalProgress };
}
