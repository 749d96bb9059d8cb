export type CorpusErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "EXTRACTION_FAILED"
  | "NETWORK_FETCH_FAILED"
  | "SEGMENTATION_DEGRADED"
  | "OUTPUT_WRITE_FAILED"
  | "NO_DOCUMENTS";

export class CorpusError extends Error {
  readonly code: CorpusErrorCode;

  constructor(code: CorpusErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unrecognised file extension or content type. The source is skipped. */
export class UnsupportedFormatError extends CorpusError {
  constructor(
    readonly source: string,
    readonly detail: string,
  ) {
    super("UNSUPPORTED_FORMAT", `Unsupported format for ${source}: ${detail}`);
  }
}

/** Malformed content in a single unit (file, page set, JSONL line). */
export class ExtractionError extends CorpusError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("EXTRACTION_FAILED", `Extraction failed for ${source}: ${message}`, options);
  }
}

export class NetworkFetchError extends CorpusError {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("NETWORK_FETCH_FAILED", `Fetch failed for ${url}: ${message}`, options);
  }
}

/** Reported, never thrown: segmentation continues in heuristic mode. */
export class SegmentationDegraded extends CorpusError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("SEGMENTATION_DEGRADED", `Sentence model unavailable, using heuristic segmentation: ${reason}`, options);
  }
}

/** The only fatal error class: the run stops as soon as it is raised. */
export class OutputWriteError extends CorpusError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("OUTPUT_WRITE_FAILED", `Cannot write ${path}: ${message}`, options);
  }
}

export class NoDocumentsError extends CorpusError {
  constructor(sources: string[]) {
    super("NO_DOCUMENTS", `No documents found in ${sources.join(", ")}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
