import { createHistogram, performance, RecordableHistogram } from "perf_hooks";
import { setTimeout as sleep } from "timers/promises";
import { MetricsLogger } from "aws-embedded-metrics";
import { errorMessage } from "./errors.js";
import { emitUnitOfWork } from "./metrics.js";

export interface TestMetadata {
  /**
   * The test name will be used as a metric dimension for reporting.
   */
  name: string;
}

export interface Test {
  metadata(): TestMetadata;

  setup(): Promise<void>;

  teardown(): Promise<void>;

  /// Drive requests to the system under test. If you perform more than one unit
  /// of work, override `requestsPerIteration` to return the number of units of
  /// work performed.
  performIteration(): Promise<void>;

  /// Number of work items performed per iteration. Defaults to 1.
  requestsPerIteration(): number;

  /// Return additional configuration information to be included in the results.
  testRunData(): object;
}

export abstract class AbstractBaseTest implements Test {
  metadata(): TestMetadata {
    return {
      name: this.constructor.name,
    };
  }

  async setup(): Promise<void> {}

  async teardown(): Promise<void> {}

  abstract performIteration(): Promise<void>;

  requestsPerIteration() {
    return 1;
  }

  testRunData(): object {
    return {};
  }
}

export interface LatencyStats {
  avg: number;
  p0: number;
  p25: number;
  p50: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  p99_9: number;
  p100: number;
}

export interface LoadTestResult {
  configuration: {
    test: string;
    targetArrivalRate: number | undefined;
    concurrency: number;
    overallDurationMillis: number;
    warmupMillis: number;
  };
  testRunData: object;
  interrupted: boolean;
  completedIterations: number;
  errorIterations: number;
  failedIterationsRatio: number;
  totalRequestsCompleted: number;
  measuredDurationMillis: number;
  throughputOverall: number;
  iterationsPerSecondPerWorker: number;
  requestLatencyStatsMillis: LatencyStats;
  workerUtilization: {
    runTimeMillis: number;
    backoffTimeMillis: number;
    behindScheduleTimeMillis: number;
    utilization: number;
  };
}

export interface LoadTestOptions {
  concurrency: number;
  durationSeconds: number;
  /** Total iterations per second across all workers. Unpaced when omitted. */
  targetRequestRatePerSecond?: number;
  skipWarmup?: boolean;
  signal?: AbortSignal;
  metrics?: MetricsLogger;
}

export class LoadTestDriver {
  private readonly concurrency: number;
  private readonly targetRps: number | undefined;
  private readonly workerCycleTimeMs: number;
  private readonly test: Test;
  private readonly name: string;
  private readonly overallDurationMs: number;
  private readonly warmupDurationMs: number;
  private readonly requestsPerIteration: number;
  private readonly signal?: AbortSignal;
  private readonly metrics?: MetricsLogger;
  private completedIterationsCount = 0;
  private errorIterations = 0;
  private failuresSeen = 0;
  private requestCount = 0;
  private workerRunTime = 0;
  private workerBackoffTime = 0;
  private workerBehindScheduleTime = 0;
  private readonly requestLatencyMicros: RecordableHistogram;

  constructor(test: Test, opts: LoadTestOptions) {
    if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${opts.concurrency}`);
    }
    if (!(opts.durationSeconds > 0)) {
      throw new RangeError(`Duration must be positive, got ${opts.durationSeconds}`);
    }
    if (opts.targetRequestRatePerSecond !== undefined && !(opts.targetRequestRatePerSecond > 0)) {
      throw new RangeError(`Target request rate must be positive, got ${opts.targetRequestRatePerSecond}`);
    }

    this.test = test;
    this.name = test.metadata().name;
    this.concurrency = opts.concurrency;
    this.targetRps = opts.targetRequestRatePerSecond;
    this.overallDurationMs = opts.durationSeconds * 1_000;
    this.requestsPerIteration = test.requestsPerIteration();
    // Each worker starts one iteration per cycle, so together they hit the target rate.
    this.workerCycleTimeMs =
      this.targetRps === undefined ? 0 : (1000 * this.concurrency) / (this.targetRps / this.requestsPerIteration);
    this.warmupDurationMs = opts.skipWarmup ? 0 : Math.min(this.overallDurationMs / 10, 10_000); // 10% of duration or 10s, whichever is smaller
    this.signal = opts.signal;
    this.metrics = opts.metrics;
    this.requestLatencyMicros = createHistogram();
  }

  async run(): Promise<LoadTestResult> {
    await this.test.setup();

    const startTime = performance.now();
    const measurementStartTime = startTime + this.warmupDurationMs;
    const endTime = startTime + this.overallDurationMs;

    const concurrentWorkerLoop = async (worker: number) => {
      // Stagger paced workers across the cycle so arrivals are evenly spread.
      let nextIterationTime = startTime + (this.workerCycleTimeMs * worker) / this.concurrency;

      while (!this.signal?.aborted) {
        const workerLoopStart = performance.now();
        if (workerLoopStart >= endTime) break; // Do not start any new work after the scheduled run end time

        if (this.workerCycleTimeMs > 0) {
          const backoffTimeMillis = nextIterationTime - workerLoopStart;
          if (backoffTimeMillis > 0) {
            this.workerBackoffTime += backoffTimeMillis;
            await sleep(Math.min(backoffTimeMillis, endTime - workerLoopStart));
            if (performance.now() >= endTime || this.signal?.aborted) break;
          } else {
            this.workerBehindScheduleTime += -backoffTimeMillis;
          }
          nextIterationTime += this.workerCycleTimeMs;
        } else {
          await sleep(0); // Yield to other tasks
        }

        const iterationStart = performance.now();
        let success = true;
        try {
          await this.test.performIteration();
        } catch (err) {
          success = false;
          // Log a sample of error messages to aid in debugging test code
          if (this.failuresSeen % 1000 == 0) {
            console.log({ message: "Iteration failed", test: this.name, worker, error: errorMessage(err) });
          }
          this.failuresSeen += 1;
        }
        const serviceTimeMillis = performance.now() - iterationStart;

        if (iterationStart >= measurementStartTime) {
          this.recordDuration(this.requestLatencyMicros, Math.round(serviceTimeMillis * 1000));
          this.completedIterationsCount += 1;
          if (success) {
            this.requestCount += this.requestsPerIteration;
          } else {
            this.errorIterations += 1;
          }
          this.workerRunTime += serviceTimeMillis;

          try {
            await emitUnitOfWork(this.metrics, this.name, {
              success,
              latencyMs: serviceTimeMillis,
              batchSize: this.requestsPerIteration,
            });
          } catch (err) {
            console.log({ message: "Failed to flush metrics", error: errorMessage(err) });
          }
        }
      }
    };

    const tasks: Array<Promise<void>> = [];
    for (let i = 0; i < this.concurrency; i++) {
      tasks.push(concurrentWorkerLoop(i));
    }
    try {
      await Promise.all(tasks);
    } finally {
      await this.test.teardown();
    }

    const measuredDurationMillis = Math.max(Math.min(performance.now(), endTime) - measurementStartTime, 0);
    return this.results(measuredDurationMillis);
  }

  private recordDuration(histogram: RecordableHistogram, iterationDurationMicros: number) {
    if (iterationDurationMicros > 0) {
      histogram.record(iterationDurationMicros); // Doesn't accept 0 values
    } else {
      // Record (highly unlikely) sub-microsecond durations as 1us – this
      // is fine since we're reporting the final results in milliseconds.
      histogram.record(1);
    }
  }

  private results(measuredDurationMillis: number): LoadTestResult {
    const perSecond = (count: number) => (measuredDurationMillis > 0 ? (count * 1_000) / measuredDurationMillis : 0);
    return {
      configuration: {
        test: this.name,
        targetArrivalRate: this.targetRps,
        concurrency: this.concurrency,
        overallDurationMillis: this.overallDurationMs,
        warmupMillis: this.warmupDurationMs,
      },
      testRunData: this.test.testRunData(),
      interrupted: this.signal?.aborted ?? false,
      completedIterations: this.completedIterationsCount,
      errorIterations: this.errorIterations,
      failedIterationsRatio:
        this.completedIterationsCount > 0 ? this.errorIterations / this.completedIterationsCount : 0,
      totalRequestsCompleted: this.requestCount,
      measuredDurationMillis,
      throughputOverall: perSecond(this.requestCount),
      iterationsPerSecondPerWorker: perSecond(this.completedIterationsCount) / this.concurrency,
      requestLatencyStatsMillis: latencyStats(this.requestLatencyMicros),
      workerUtilization: {
        runTimeMillis: this.workerRunTime,
        backoffTimeMillis: this.workerBackoffTime,
        behindScheduleTimeMillis: this.workerBehindScheduleTime,
        utilization:
          this.workerRunTime + this.workerBackoffTime > 0
            ? this.workerRunTime / (this.workerRunTime + this.workerBackoffTime)
            : 0,
      },
    };
  }
}

/** Summarises a microsecond histogram in milliseconds. All zeros when nothing was recorded. */
export function latencyStats(histogram: RecordableHistogram): LatencyStats {
  if (histogram.count === 0) {
    return { avg: 0, p0: 0, p25: 0, p50: 0, p75: 0, p90: 0, p95: 0, p99: 0, p99_9: 0, p100: 0 };
  }
  return {
    avg: histogram.mean / 1_000,
    p0: histogram.min / 1_000,
    p25: histogram.percentile(25) / 1_000,
    p50: histogram.percentile(50) / 1_000,
    p75: histogram.percentile(75) / 1_000,
    p90: histogram.percentile(90) / 1_000,
    p95: histogram.percentile(95) / 1_000,
    p99: histogram.percentile(99) / 1_000,
    p99_9: histogram.percentile(99.9) / 1_000,
    p100: histogram.max / 1_000,
  };
}
