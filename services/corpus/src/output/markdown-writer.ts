import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { OutputWriteError, errorMessage } from "../errors.js";
import { isUrl } from "../sources/formats.js";
import type { CorpusRecord, RecordSink } from "./types.js";

function sanitize(segment: string): string {
  return segment.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^_+|_+$/g, "");
}

/**
 * Relative path (without ".md") for a record's source: the source's own
 * relative path with its extension folded in (`docs/a.txt` becomes
 * `docs/a_txt`), the URL host and path with dots turned into underscores,
 * plus `_L<n>` for a JSONL line.
 */
export function markdownStem(record: Pick<CorpusRecord, "source" | "line">): string {
  let stem: string;
  if (isUrl(record.source)) {
    const url = new URL(record.source);
    stem = sanitize(`${url.hostname}${url.pathname}`.replace(/\./g, "_")) || "index";
  } else {
    stem = record.source
      .split("/")
      .filter((part) => part && part !== "." && part !== "..")
      .map(sanitize)
      .join("/")
      .replace(/\.([^./]+)$/, "_$1");
  }
  return record.line === undefined ? stem : `${stem}_L${record.line}`;
}

/** Path of one chunk's file: `<stem>.md`, or `<stem>_<n>.md` when the document has several chunks. */
export function markdownPath(record: CorpusRecord): string {
  const suffix = record.total_chunks > 1 ? `_${record.chunk_index + 1}` : "";
  return `${markdownStem(record)}${suffix}.md`;
}

/** Writes every chunk as its own Markdown file under `directory`. */
export class MarkdownChunkWriter implements RecordSink {
  constructor(readonly directory: string) {}

  async write(records: CorpusRecord[]): Promise<void> {
    for (const record of records) {
      const path = join(this.directory, markdownPath(record));
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, `${record.text}\n`, "utf-8");
      } catch (error) {
        throw new OutputWriteError(path, errorMessage(error), { cause: error });
      }
    }
  }

  async close(): Promise<void> {}
}
