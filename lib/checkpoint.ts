import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { SetupError, errorMessage } from "./errors.js";

const CheckpointSchema = z.object({
  last_index: z.number().int().nonnegative(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

/**
 * An approximate resume point. Everything below the stored offset reached a
 * final outcome in an earlier run; items above it may be sent again.
 */
export interface CheckpointStore {
  load(): Promise<number | undefined>;
  /** Never throws; returns false when the write failed. */
  save(offset: number): Promise<boolean>;
}

export class FileCheckpointStore implements CheckpointStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async load(): Promise<number | undefined> {
    let contents: string;
    try {
      contents = await readFile(this.path, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw new SetupError(`Cannot read checkpoint file ${this.path}`, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (err) {
      console.log({ message: "Ignoring unreadable checkpoint file", path: this.path, error: errorMessage(err) });
      return undefined;
    }

    const checkpoint = CheckpointSchema.safeParse(parsed);
    if (!checkpoint.success) {
      console.log({ message: "Ignoring malformed checkpoint file", path: this.path, issues: checkpoint.error.issues });
      return undefined;
    }
    return checkpoint.data.last_index;
  }

  async save(offset: number): Promise<boolean> {
    const checkpoint: Checkpoint = { last_index: offset };
    try {
      await writeFile(this.path, JSON.stringify(checkpoint));
      return true;
    } catch (err) {
      console.log({ message: "Failed to write checkpoint", path: this.path, offset, error: errorMessage(err) });
      return false;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
