import type { Logger } from "../logger.js";

/** Tagged variant over every supported input format. */
export type DocumentFormat = "html" | "pdf" | "markdown" | "text" | "jsonl";

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ["html", "pdf", "markdown", "text", "jsonl"];

export interface Document {
  readonly sourceId: string; // Unique per document; a JSONL line gets `${origin}#L${line}`
  readonly origin: string; // File path as given or joined onto the walked directory, or URL
  readonly format: DocumentFormat;
  readonly rawText: string;
  readonly title?: string;
  readonly metadata: Readonly<DocumentMetadata>;
}

export interface DocumentMetadata {
  url?: string;
  line?: number;
}

export interface ExtractorInput {
  sourceId: string;
  origin: string;
  data: Uint8Array;
  /** File name without extension, or the URL host; the fallback title. */
  name: string;
  url?: string;
  /** Charset from the response's `Content-Type`; local files are UTF-8. */
  charset?: string;
}

/** A unit inside a source that was dropped without failing the source. */
export interface SkippedUnit {
  unit: string;
  reason: string;
}

export interface ExtractContext {
  logger: Logger;
  jsonlTextKey: string;
  stripBoilerplate: boolean;
  onSkip?: (skipped: SkippedUnit) => void;
}

export interface Extractor {
  readonly format: DocumentFormat;
  extract(input: ExtractorInput, context: ExtractContext): Promise<Document[]>;
}
