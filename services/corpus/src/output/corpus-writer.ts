import { mkdir, open, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { OutputWriteError, errorMessage } from "../errors.js";
import type { CorpusRecord, RecordSink } from "./types.js";

/**
 * JSON Lines corpus file. Opening truncates, so re-running into the same
 * path replaces the previous corpus instead of appending to it.
 */
export class CorpusWriter implements RecordSink {
  private recordsWritten = 0;

  private constructor(
    readonly path: string,
    private handle: FileHandle | null,
  ) {}

  static async open(path: string): Promise<CorpusWriter> {
    try {
      await mkdir(dirname(path), { recursive: true });
      const handle = await open(path, "w");
      return new CorpusWriter(path, handle);
    } catch (error) {
      throw new OutputWriteError(path, errorMessage(error), { cause: error });
    }
  }

  get count(): number {
    return this.recordsWritten;
  }

  async write(records: CorpusRecord[]): Promise<void> {
    if (records.length === 0) return;
    if (!this.handle) {
      throw new OutputWriteError(this.path, "writer is closed");
    }
    const lines = records.map((record) => JSON.stringify(record) + "\n").join("");
    try {
      await this.handle.write(lines);
    } catch (error) {
      throw new OutputWriteError(this.path, errorMessage(error), { cause: error });
    }
    this.recordsWritten += records.length;
  }

  async close(): Promise<void> {
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    try {
      await handle.close();
    } catch (error) {
      throw new OutputWriteError(this.path, errorMessage(error), { cause: error });
    }
  }
}
