import { MetricsLogger } from "aws-embedded-metrics";
import PQueue from "p-queue";
import pRetry from "p-retry";
import { performance } from "perf_hooks";
import { BackoffPolicy, DEFAULT_BACKOFF, DEFAULT_MAX_ATTEMPTS, retryOptions } from "./backoff.js";
import { AggregateCounters, AttemptStats, CounterSnapshot, addStats, emptyStats } from "./counters.js";
import { BatchInterruptedError, ThrottledError, UnprocessedItemsError, errorMessage } from "./errors.js";
import { emitUnitOfWork } from "./metrics.js";

export type SubmitOutcome<T> =
  | { kind: "complete"; stats: AttemptStats }
  | { kind: "partial"; remaining: T[]; stats: AttemptStats }
  | { kind: "rejected"; error: unknown; retryable: boolean; stats: AttemptStats };

/** One call of a store's batch API. Implementations never throw; failures come back as `rejected`. */
export interface BatchTarget<T> {
  readonly name: string;
  readonly maxBatchSize: number;
  submit(items: readonly T[]): Promise<SubmitOutcome<T>>;
}

export interface Batch<T> {
  offset: number;
  items: readonly T[];
}

export interface RetryOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
  signal?: AbortSignal;
}

export interface RetryResult {
  ok: boolean;
  /** Number of calls made to the target. */
  attempts: number;
  /** Items still unaccepted when the loop gave up; zero on success. */
  remaining: number;
  interrupted: boolean;
  error?: unknown;
  stats: AttemptStats;
}

/**
 * Submits a batch until the store has accepted every item. After the first
 * attempt only the items the store reported as unprocessed are sent again.
 */
export async function submitWithRetry<T>(
  target: BatchTarget<T>,
  batch: Batch<T>,
  opts: RetryOptions,
): Promise<RetryResult> {
  let remaining = batch.items;
  let attempts = 0;
  const stats = emptyStats();

  try {
    await pRetry(
      async () => {
        if (opts.signal?.aborted) {
          throw new pRetry.AbortError(new BatchInterruptedError());
        }
        attempts += 1;
        const outcome = await target.submit(remaining);
        addStats(stats, outcome.stats);

        switch (outcome.kind) {
          case "complete":
            remaining = [];
            return;
          case "partial":
            if (outcome.remaining.length === 0) {
              remaining = [];
              return;
            }
            remaining = outcome.remaining;
            throw new UnprocessedItemsError(remaining.length, batch.items.length);
          case "rejected":
            if (outcome.retryable) {
              throw new ThrottledError(outcome.error);
            }
            throw new pRetry.AbortError(
              outcome.error instanceof Error ? outcome.error : new Error(errorMessage(outcome.error)),
            );
        }
      },
      {
        ...retryOptions(opts.maxAttempts, opts.backoff),
        onFailedAttempt: () => {
          // Throwing here stops p-retry before it sleeps for the next attempt.
          if (opts.signal?.aborted) {
            throw new BatchInterruptedError();
          }
        },
      },
    );
    return { ok: true, attempts, remaining: 0, interrupted: false, stats };
  } catch (err) {
    return {
      ok: false,
      attempts,
      remaining: remaining.length,
      interrupted: err instanceof BatchInterruptedError,
      error: err,
      stats,
    };
  }
}

export interface HarnessOptions<T> {
  target: BatchTarget<T>;
  /** Must return the same records for the same arguments so that retries and resumed runs match. */
  generate: (offset: number, size: number) => T[];
  totalItems: number;
  startOffset?: number;
  batchSize: number;
  concurrency: number;
  /** Batches allowed to wait for a worker before the producer pauses. Defaults to 2 × concurrency. */
  queueCapacity?: number;
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  signal?: AbortSignal;
  metrics?: MetricsLogger;
}

export interface HarnessResult extends CounterSnapshot {
  configuration: {
    target: string;
    totalItems: number;
    startOffset: number;
    batchSize: number;
    concurrency: number;
    maxAttempts: number;
    backoff: BackoffPolicy;
  };
  interrupted: boolean;
  elapsedMillis: number;
  throughput: number;
}

export class BatchHarness<T> {
  readonly counters: AggregateCounters;
  private readonly target: BatchTarget<T>;
  private readonly generate: (offset: number, size: number) => T[];
  private readonly totalItems: number;
  private readonly startOffset: number;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly queueCapacity: number;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly signal?: AbortSignal;
  private readonly metrics?: MetricsLogger;

  constructor(opts: HarnessOptions<T>) {
    this.target = opts.target;
    this.generate = opts.generate;
    this.totalItems = opts.totalItems;
    this.startOffset = opts.startOffset ?? 0;
    this.batchSize = opts.batchSize;
    this.concurrency = opts.concurrency;
    this.queueCapacity = opts.queueCapacity ?? opts.concurrency * 2;
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.backoff = opts.backoff ?? DEFAULT_BACKOFF;
    this.signal = opts.signal;
    this.metrics = opts.metrics;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1 || this.batchSize > this.target.maxBatchSize) {
      throw new RangeError(`Batch size must be between 1 and ${this.target.maxBatchSize}, got ${this.batchSize}`);
    }
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${this.concurrency}`);
    }
    if (!Number.isInteger(this.queueCapacity) || this.queueCapacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${this.queueCapacity}`);
    }
    if (!Number.isInteger(this.totalItems) || this.totalItems < 0 || this.startOffset < 0) {
      throw new RangeError("Item count and start offset must be non-negative integers");
    }
    // Fail fast on a bad retry configuration rather than inside every worker.
    retryOptions(this.maxAttempts, this.backoff);

    this.counters = new AggregateCounters(this.startOffset);
  }

  async run(): Promise<HarnessResult> {
    const queue = new PQueue({ concurrency: this.concurrency });
    const startTime = performance.now();

    // Batches still waiting for a worker are dropped on interrupt; they were never submitted.
    const onAbort = () => queue.clear();
    this.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      for (let offset = this.startOffset; offset < this.totalItems; offset += this.batchSize) {
        while (queue.size >= this.queueCapacity) {
          await queue.onEmpty();
        }
        if (this.signal?.aborted) {
          break;
        }
        const size = Math.min(this.batchSize, this.totalItems - offset);
        const batch: Batch<T> = { offset, items: this.generate(offset, size) };
        void queue.add(() => this.process(batch));
      }
      await queue.onIdle();
    } finally {
      this.signal?.removeEventListener("abort", onAbort);
    }

    const elapsedMillis = performance.now() - startTime;
    const snapshot = this.counters.snapshot();
    return {
      configuration: {
        target: this.target.name,
        totalItems: this.totalItems,
        startOffset: this.startOffset,
        batchSize: this.batchSize,
        concurrency: this.concurrency,
        maxAttempts: this.maxAttempts,
        backoff: this.backoff,
      },
      ...snapshot,
      interrupted: this.signal?.aborted ?? false,
      elapsedMillis,
      throughput: elapsedMillis > 0 ? (snapshot.itemsSucceeded * 1_000) / elapsedMillis : 0,
    };
  }

  private async process(batch: Batch<T>): Promise<void> {
    const started = performance.now();
    this.counters.recordSubmitted(batch.items.length);

    const result = await submitWithRetry(this.target, batch, {
      maxAttempts: this.maxAttempts,
      backoff: this.backoff,
      signal: this.signal,
    });

    this.counters.recordCompletion({
      offset: batch.offset,
      size: batch.items.length,
      ok: result.ok,
      attempts: result.attempts,
      interrupted: result.interrupted,
      stats: result.stats,
    });

    if (!result.ok && !result.interrupted) {
      console.log({
        message: "Batch failed",
        offset: batch.offset,
        size: batch.items.length,
        attempts: result.attempts,
        unprocessed: result.remaining,
        error: errorMessage(result.error),
      });
    }

    try {
      await emitUnitOfWork(this.metrics, this.target.name, {
        success: result.ok,
        latencyMs: performance.now() - started,
        batchSize: batch.items.length,
      });
    } catch (err) {
      console.log({ message: "Failed to flush metrics", error: errorMessage(err) });
    }
  }
}
