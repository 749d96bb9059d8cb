import { createHash } from "node:crypto";
import { chunkText } from "../chunking/sentence-chunker.js";
import type { Chunk } from "../chunking/types.js";
import type { Document } from "../extractors/types.js";
import type { CorpusRecord } from "./types.js";

/** Stable record id: hash of the document's source id plus the chunk index. */
export function recordId(sourceId: string, chunkIndex: number): string {
  const sourceHash = createHash("md5").update(sourceId).digest("hex").slice(0, 12);
  return `${sourceHash}_${chunkIndex}`;
}

/**
 * Records for all chunks of one document. `total_chunks` is only known
 * here, once the document has been chunked completely.
 */
export function buildRecords(document: Document, chunks: Chunk[]): CorpusRecord[] {
  return chunks.map((chunk) => ({
    id: recordId(document.sourceId, chunk.chunkIndex),
    text: chunkText(chunk),
    source: document.origin,
    title: document.title,
    format: document.format,
    chunk_index: chunk.chunkIndex,
    total_chunks: chunks.length,
    token_count: chunk.tokenCount,
    url: document.metadata.url,
    line: document.metadata.line,
  }));
}
