import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";

import type { Checkpoint } from "./types.js";

const CheckpointFileSchema = z.record(z.string(), z.literal("done"));

export class CheckpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckpointError";
  }
}

/**
 * JSON file mapping chapter title -> "done". Written whole on every save.
 */
export class CheckpointStore {
  constructor(readonly filePath: string) {}

  load(): Checkpoint {
    if (!fs.existsSync(this.filePath)) return {};

    const text = fs.readFileSync(this.filePath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new CheckpointError(
        `Checkpoint ${this.filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
      );
    }

    const parsed = CheckpointFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CheckpointError(`Checkpoint ${this.filePath} must be an object of title -> "done"`);
    }
    return { ...parsed.data };
  }

  save(data: Checkpoint): void {
    fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf8");
    fs.renameSync(tmp, this.filePath);
    console.log(`[checkpoint] Saved ${Object.keys(data).length} entries to ${this.filePath}`);
  }
}
