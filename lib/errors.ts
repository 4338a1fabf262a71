import { MetadataBearer } from "@aws-sdk/types";

/**
 * Error names DynamoDB and the SDK use when a request was refused for capacity
 * reasons. These are worth retrying after a backoff; anything else is not.
 */
export const THROTTLING_ERROR_NAMES: ReadonlySet<string> = new Set([
  "ProvisionedThroughputExceededException",
  "ThrottlingException",
  "RequestLimitExceeded",
  "ThrottlingError",
]);

export type ErrorClass = "throttling" | "non-retryable";

export function classifyError(err: unknown): ErrorClass {
  if (err instanceof Error && THROTTLING_ERROR_NAMES.has(err.name)) {
    return "throttling";
  }
  return "non-retryable";
}

export function errorName(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// See https://github.com/aws/aws-sdk-js-v3/blob/f1fe216ef15d6b7503755cb3ef8568d00c04b6f8/packages/middleware-retry/src/defaultStrategy.ts#L113-L147
export function sdkRetryStats(source: unknown): { attempts: number; totalRetryDelay: number } {
  const metadata = isMetadataBearer(source) ? source.$metadata : undefined;
  return {
    attempts: Math.max((metadata?.attempts ?? 1) - 1, 0),
    totalRetryDelay: metadata?.totalRetryDelay ?? 0,
  };
}

function isMetadataBearer(value: unknown): value is MetadataBearer {
  return typeof value === "object" && value !== null && "$metadata" in value;
}

/** Thrown inside the retry loop when the store handed back part of a batch. */
export class UnprocessedItemsError extends Error {
  readonly remaining: number;

  constructor(remaining: number, total: number) {
    super(`${remaining} of ${total} items were not processed`);
    this.name = "UnprocessedItemsError";
    this.remaining = remaining;
  }
}

/** Thrown inside the retry loop when the whole attempt was throttled. */
export class ThrottledError extends Error {
  constructor(cause: unknown) {
    super(`Batch attempt throttled: ${errorName(cause)}`, { cause });
    this.name = "ThrottledError";
  }
}

export class BatchInterruptedError extends Error {
  constructor() {
    super("Batch submission interrupted");
    this.name = "BatchInterruptedError";
  }
}

/** Failure to reach the store or find the table; aborts a run before any work starts. */
export class SetupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, { cause });
    this.name = "SetupError";
  }
}
