import PQueue from "p-queue";
import { performance } from "perf_hooks";
import { CheckpointStore } from "./checkpoint.js";
import { CounterSnapshot } from "./counters.js";
import { errorMessage } from "./errors.js";

export interface ProgressSample {
  itemsDone: number;
  targetItems: number;
  /** Items per second since the previous sample. */
  instantRate: number;
  /** Items per second since the reporter started. */
  overallRate: number;
  percentComplete: number;
  /** Undefined until something has completed. */
  etaSeconds: number | undefined;
  elapsedSeconds: number;
  watermark: number;
}

export interface ReporterOptions {
  read: () => CounterSnapshot;
  /** Items this run is expected to process. */
  targetItems: number;
  intervalMs?: number;
  checkpoint?: CheckpointStore;
  now?: () => number;
  log?: (sample: ProgressSample) => void;
}

export const DEFAULT_REPORT_INTERVAL_MS = 5_000;

/**
 * Samples the harness counters on a timer, logs progress and writes the
 * checkpoint. Reads snapshots only, so it never slows the workers down.
 * Checkpoint writes run one at a time in the order they were requested, so
 * the last one written is always the last one asked for.
 */
export class ThroughputReporter {
  private readonly read: () => CounterSnapshot;
  private readonly targetItems: number;
  private readonly intervalMs: number;
  private readonly checkpointStore?: CheckpointStore;
  private readonly now: () => number;
  private readonly log: (sample: ProgressSample) => void;
  private startTime = 0;
  private lastSampleTime = 0;
  private lastItemsDone = 0;
  private timer: NodeJS.Timeout | undefined;
  private readonly saves = new PQueue({ concurrency: 1 });

  constructor(opts: ReporterOptions) {
    this.read = opts.read;
    this.targetItems = opts.targetItems;
    this.intervalMs = opts.intervalMs ?? DEFAULT_REPORT_INTERVAL_MS;
    this.checkpointStore = opts.checkpoint;
    this.now = opts.now ?? (() => performance.now());
    this.log = opts.log ?? ((sample) => console.log(formatProgress(sample)));
  }

  start() {
    this.startTime = this.now();
    this.lastSampleTime = this.startTime;
    this.lastItemsDone = 0;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        console.log({ message: "Progress report failed", error: errorMessage(err) });
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  sample(): ProgressSample {
    const now = this.now();
    const snapshot = this.read();
    const itemsDone = snapshot.itemsSucceeded + snapshot.itemsFailed;

    const sinceLastSeconds = (now - this.lastSampleTime) / 1_000;
    const elapsedSeconds = (now - this.startTime) / 1_000;
    const instantRate = sinceLastSeconds > 0 ? (itemsDone - this.lastItemsDone) / sinceLastSeconds : 0;
    const overallRate = elapsedSeconds > 0 ? itemsDone / elapsedSeconds : 0;

    this.lastSampleTime = now;
    this.lastItemsDone = itemsDone;

    return {
      itemsDone,
      targetItems: this.targetItems,
      instantRate,
      overallRate,
      percentComplete: this.targetItems > 0 ? (itemsDone / this.targetItems) * 100 : 100,
      etaSeconds: overallRate > 0 ? Math.max(this.targetItems - itemsDone, 0) / overallRate : undefined,
      elapsedSeconds,
      watermark: snapshot.watermark,
    };
  }

  async checkpoint(offset: number): Promise<boolean> {
    const store = this.checkpointStore;
    if (!store) {
      return true;
    }
    return this.saves.add(() => store.save(offset));
  }

  async tick(): Promise<ProgressSample> {
    const sample = this.sample();
    this.log(sample);
    await this.checkpoint(sample.watermark);
    return sample;
  }

  /**
   * Stops the timer and records one last sample and checkpoint, written after
   * any save a periodic tick still has in flight.
   */
  async stop(): Promise<ProgressSample> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const sample = await this.tick();
    await this.saves.onIdle();
    return sample;
  }
}

export function formatProgress(sample: ProgressSample): string {
  const eta = sample.etaSeconds === undefined ? "unknown" : `${(sample.etaSeconds / 60).toFixed(1)} minutes`;
  return (
    `Progress: ${sample.itemsDone.toLocaleString("en-US")}/${sample.targetItems.toLocaleString("en-US")} ` +
    `(${sample.percentComplete.toFixed(2)}%) | ` +
    `Current rate: ${sample.instantRate.toFixed(2)} items/sec | ` +
    `Overall rate: ${sample.overallRate.toFixed(2)} items/sec | ` +
    `ETA: ${eta}`
  );
}
