import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { BackoffPolicy, DEFAULT_BACKOFF, DEFAULT_MAX_ATTEMPTS } from "./backoff.js";

const EnvSchema = z.object({
  TABLE_NAME: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  DYNAMODB_ENDPOINT: z.string().url().optional(),
  CHECKPOINT_FILE: z.string().min(1).default("dynamodb_insert_progress.json"),
});

export type Environment = z.infer<typeof EnvSchema>;

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("Not a positive number.");
  }
  return n;
}

export function batchSizeParser(max: number): (value: string) => number {
  return (value) => {
    const n = parsePositiveInt(value);
    if (n > max) {
      throw new InvalidArgumentError(`At most ${max} items fit in one request.`);
    }
    return n;
  };
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return n;
}

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Options shared by every command that runs the batch harness. */
export type HarnessFlags = {
  concurrency: number;
  batchSize: number;
  maxAttempts: number;
  backoffBase: number;
  backoffCap: number;
  jitter?: boolean;
};

export function withHarnessOptions(command: Command, maxBatchSize: number, concurrency: number): Command {
  return command
    .option("-c, --concurrency <n>", "Batches in flight at once", parsePositiveInt, concurrency)
    .option("-b, --batch-size <n>", `Items per batch, at most ${maxBatchSize}`, batchSizeParser(maxBatchSize), maxBatchSize)
    .option("--max-attempts <n>", "Attempts per batch before it counts as failed", parsePositiveInt, DEFAULT_MAX_ATTEMPTS)
    .option("--backoff-base <ms>", "Delay before the first retry", parsePositiveInt, DEFAULT_BACKOFF.baseDelayMs)
    .option("--backoff-cap <ms>", "Longest delay between retries", parsePositiveInt, DEFAULT_BACKOFF.maxDelayMs)
    .option("--jitter", "Randomize retry delays");
}

export function backoffFromFlags(flags: HarnessFlags): BackoffPolicy {
  return { baseDelayMs: flags.backoffBase, maxDelayMs: flags.backoffCap, jitter: flags.jitter ?? false };
}

/** Options shared by the fixed-duration benchmarks. */
export type DriverFlags = {
  concurrency: number;
  duration: number;
  rate?: number;
  skipWarmup?: boolean;
};

export function withDriverOptions(command: Command, concurrency: number): Command {
  return command
    .option("-c, --concurrency <n>", "Concurrent workers", parsePositiveInt, concurrency)
    .option("-d, --duration <seconds>", "How long to run", parsePositiveNumber, 60)
    .option("-r, --rate <n>", "Target iterations per second across all workers; unpaced when omitted", parsePositiveNumber)
    .option("--skip-warmup", "Measure from the first iteration");
}
