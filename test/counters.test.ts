import { AggregateCounters, CompletionWatermark, emptyStats } from "../lib/counters.js";

function completion(offset: number, size: number, ok: boolean, interrupted = false) {
  return { offset, size, ok, attempts: ok ? 1 : 5, interrupted, stats: { ...emptyStats(), observed: ok ? size : 0 } };
}

describe("CompletionWatermark", () => {
  test("advances only across contiguous completed ranges", () => {
    const watermark = new CompletionWatermark(0);
    watermark.complete(25, 25);
    expect(watermark.value).toBe(0);
    watermark.complete(75, 25);
    expect(watermark.value).toBe(0);
    watermark.complete(0, 25);
    expect(watermark.value).toBe(50);
    watermark.complete(50, 25);
    expect(watermark.value).toBe(100);
  });

  test("starts at the resume offset", () => {
    const watermark = new CompletionWatermark(500);
    watermark.complete(500, 10);
    expect(watermark.value).toBe(510);
  });
});

describe("AggregateCounters", () => {
  test("every submitted item ends up succeeded or failed", () => {
    const counters = new AggregateCounters();
    counters.recordSubmitted(25);
    counters.recordSubmitted(25);
    counters.recordSubmitted(10);
    counters.recordCompletion(completion(0, 25, true));
    counters.recordCompletion(completion(25, 25, false));
    counters.recordCompletion(completion(50, 10, true));

    const snapshot = counters.snapshot();
    expect(snapshot.itemsSubmitted).toBe(60);
    expect(snapshot.itemsSucceeded).toBe(35);
    expect(snapshot.itemsFailed).toBe(25);
    expect(snapshot.itemsSucceeded + snapshot.itemsFailed).toBe(snapshot.itemsSubmitted);
    expect(snapshot.batchesSucceeded).toBe(2);
    expect(snapshot.batchesFailed).toBe(1);
    expect(snapshot.batchRetryAttempts).toBe(4);
    expect(snapshot.itemsObserved).toBe(35);
    expect(snapshot.watermark).toBe(60);
  });

  test("interrupted batches are failed but hold the watermark back", () => {
    const counters = new AggregateCounters();
    counters.recordCompletion(completion(0, 25, true));
    counters.recordCompletion(completion(25, 25, false, true));
    counters.recordCompletion(completion(50, 25, true));

    const snapshot = counters.snapshot();
    expect(snapshot.itemsFailed).toBe(25);
    expect(snapshot.batchesInterrupted).toBe(1);
    expect(snapshot.watermark).toBe(25);
  });

  test("snapshots are frozen copies", () => {
    const counters = new AggregateCounters();
    const before = counters.snapshot();
    counters.recordCompletion(completion(0, 5, true));
    expect(before.itemsSucceeded).toBe(0);
    expect(Object.isFrozen(before)).toBe(true);
  });
});
