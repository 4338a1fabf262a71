export interface AttemptStats {
  /** Items the store acknowledged: accepted writes, or items returned by a read. */
  observed: number;
  consumedCapacity: number;
  sdkRetryAttempts: number;
  sdkRetryDelayMs: number;
}

export function emptyStats(): AttemptStats {
  return { observed: 0, consumedCapacity: 0, sdkRetryAttempts: 0, sdkRetryDelayMs: 0 };
}

export function addStats(into: AttemptStats, from: AttemptStats): AttemptStats {
  into.observed += from.observed;
  into.consumedCapacity += from.consumedCapacity;
  into.sdkRetryAttempts += from.sdkRetryAttempts;
  into.sdkRetryDelayMs += from.sdkRetryDelayMs;
  return into;
}

/**
 * Tracks the lowest offset below which every batch has finished. Batches can
 * complete in any order; the watermark only moves across a contiguous run.
 */
export class CompletionWatermark {
  private low: number;
  private readonly completed = new Map<number, number>();

  constructor(startOffset: number) {
    this.low = startOffset;
  }

  get value(): number {
    return this.low;
  }

  complete(offset: number, size: number) {
    if (offset + size <= this.low) {
      return;
    }
    this.completed.set(offset, offset + size);
    for (let end = this.completed.get(this.low); end !== undefined; end = this.completed.get(this.low)) {
      this.completed.delete(this.low);
      this.low = end;
    }
  }
}

export interface CounterSnapshot {
  readonly itemsSubmitted: number;
  readonly itemsSucceeded: number;
  readonly itemsFailed: number;
  readonly itemsObserved: number;
  readonly batchesSucceeded: number;
  readonly batchesFailed: number;
  readonly batchesInterrupted: number;
  readonly batchRetryAttempts: number;
  readonly consumedCapacity: number;
  readonly sdkRetryAttempts: number;
  readonly sdkRetryDelayMs: number;
  readonly watermark: number;
}

export interface BatchCompletion {
  offset: number;
  size: number;
  ok: boolean;
  attempts: number;
  interrupted: boolean;
  stats: AttemptStats;
}

/**
 * Run-wide counters. Workers only touch them through `recordSubmitted` and
 * `recordCompletion`; everyone else reads a frozen snapshot.
 */
export class AggregateCounters {
  private itemsSubmitted = 0;
  private itemsSucceeded = 0;
  private itemsFailed = 0;
  private batchesSucceeded = 0;
  private batchesFailed = 0;
  private batchesInterrupted = 0;
  private batchRetryAttempts = 0;
  private readonly stats = emptyStats();
  private readonly watermark: CompletionWatermark;

  constructor(startOffset = 0) {
    this.watermark = new CompletionWatermark(startOffset);
  }

  recordSubmitted(items: number) {
    this.itemsSubmitted += items;
  }

  recordCompletion(completion: BatchCompletion) {
    addStats(this.stats, completion.stats);
    this.batchRetryAttempts += Math.max(completion.attempts - 1, 0);

    if (completion.ok) {
      this.itemsSucceeded += completion.size;
      this.batchesSucceeded += 1;
    } else {
      this.itemsFailed += completion.size;
      this.batchesFailed += 1;
    }

    // An interrupted batch never reached a terminal outcome; a resumed run must send it again.
    if (completion.interrupted) {
      this.batchesInterrupted += 1;
    } else {
      this.watermark.complete(completion.offset, completion.size);
    }
  }

  snapshot(): CounterSnapshot {
    return Object.freeze({
      itemsSubmitted: this.itemsSubmitted,
      itemsSucceeded: this.itemsSucceeded,
      itemsFailed: this.itemsFailed,
      itemsObserved: this.stats.observed,
      batchesSucceeded: this.batchesSucceeded,
      batchesFailed: this.batchesFailed,
      batchesInterrupted: this.batchesInterrupted,
      batchRetryAttempts: this.batchRetryAttempts,
      consumedCapacity: this.stats.consumedCapacity,
      sdkRetryAttempts: this.stats.sdkRetryAttempts,
      sdkRetryDelayMs: this.stats.sdkRetryDelayMs,
      watermark: this.watermark.value,
    });
  }
}
