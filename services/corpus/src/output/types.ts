import type { DocumentFormat } from "../extractors/types.js";

/** One line of the output corpus. Field names are the on-disk format. */
export interface CorpusRecord {
  id: string;
  text: string;
  source: string;
  title?: string;
  format: DocumentFormat;
  chunk_index: number;
  total_chunks: number;
  token_count: number;
  url?: string;
  line?: number;
}

/** Where finished documents go. Writers are driven by one caller at a time. */
export interface RecordSink {
  write(records: CorpusRecord[]): Promise<void>;
  close(): Promise<void>;
}
