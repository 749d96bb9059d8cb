import { readFile } from "node:fs/promises";
import { basename, extname, sep } from "node:path";
import { chunkSentences } from "../chunking/sentence-chunker.js";
import type { TokenEstimator } from "../chunking/types.js";
import {
  CorpusError,
  ExtractionError,
  OutputWriteError,
  UnsupportedFormatError,
  errorMessage,
  type CorpusErrorCode,
} from "../errors.js";
import { getExtractor } from "../extractors/index.js";
import type { Document, ExtractContext, ExtractorInput } from "../extractors/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { CorpusWriter, MarkdownChunkWriter, buildRecords, type CorpusRecord, type RecordSink } from "../output/index.js";
import type { SegmentationMode, SentenceSegmenter } from "../segmentation/types.js";
import {
  charsetOf,
  fetchResource,
  formatForContentType,
  formatForPath,
  resolveSources,
  type FetchOptions,
  type SourceRef,
} from "../sources/index.js";
import { normalizeText } from "../text/normalize.js";
import { withSpan } from "../tracing.js";

export interface BuildCorpusOptions {
  output: string;
  /** Also write every chunk as a Markdown file below this directory. */
  markdownDir?: string;
  maxTokens: number;
  overlapSentences: number;
  estimateTokens: TokenEstimator;
  segmenter: SentenceSegmenter;
  jsonlTextKey?: string;
  stripBoilerplate?: boolean;
  fetch: Omit<FetchOptions, "logger">;
  /** Documents prepared at the same time; output order never depends on it. */
  concurrency?: number;
  logger?: Logger;
}

export interface SkippedSource {
  source: string;
  reason: string;
  code?: CorpusErrorCode;
}

export interface BuildCorpusResult {
  sourcesProcessed: number;
  documentsProcessed: number;
  chunksWritten: number;
  skipped: SkippedSource[];
  segmentationMode: SegmentationMode;
}

interface SourceOutcome {
  label: string;
  documents: number;
  records: CorpusRecord[];
  skipped: SkippedSource[];
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

function skippedFrom(source: string, error: unknown): SkippedSource {
  return {
    source,
    reason: errorMessage(error),
    code: error instanceof CorpusError ? error.code : undefined,
  };
}

async function loadInput(ref: SourceRef, options: BuildCorpusOptions, logger: Logger) {
  if (ref.kind === "file") {
    const origin = toPosix(ref.path);
    const format = formatForPath(ref.path);
    if (!format) {
      throw new UnsupportedFormatError(origin, `extension '${extname(ref.path) || "(none)"}'`);
    }
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(ref.path));
    } catch (error) {
      throw new ExtractionError(origin, `cannot read file (${errorMessage(error)})`, { cause: error });
    }
    const input: ExtractorInput = {
      sourceId: origin,
      origin,
      data,
      name: basename(ref.path, extname(ref.path)),
    };
    return { format, input };
  }

  const fetched = await fetchResource(ref.url, { ...options.fetch, logger });
  const format = formatForContentType(fetched.contentType, fetched.finalUrl);
  if (!format) {
    throw new UnsupportedFormatError(ref.url, `content type '${fetched.contentType ?? "(none)"}'`);
  }
  const input: ExtractorInput = {
    sourceId: ref.url,
    origin: ref.url,
    data: fetched.data,
    name: new URL(ref.url).hostname,
    url: fetched.finalUrl,
    charset: charsetOf(fetched.contentType),
  };
  return { format, input };
}

function chunkDocument(document: Document, options: BuildCorpusOptions, logger: Logger): CorpusRecord[] {
  const text = normalizeText(document.rawText);
  const sentences = options.segmenter.segment(text).map((sentence, position) => ({ text: sentence, position }));

  const chunks = chunkSentences(sentences, document.sourceId, {
    maxTokens: options.maxTokens,
    overlapSentences: options.overlapSentences,
    estimateTokens: options.estimateTokens,
    onOversized: (sentence, tokens) =>
      logger.info("Sentence exceeds the token budget; emitted as its own chunk", {
        source: document.sourceId,
        position: sentence.position,
        tokens,
        maxTokens: options.maxTokens,
      }),
  });

  return buildRecords(document, chunks);
}

/**
 * Everything for one resolved file or URL. Never rejects; failures are
 * returned as skips.
 */
async function processSource(ref: SourceRef, options: BuildCorpusOptions, logger: Logger): Promise<SourceOutcome> {
  const label = ref.kind === "file" ? toPosix(ref.path) : ref.url;
  const outcome: SourceOutcome = { label, documents: 0, records: [], skipped: [] };

  try {
    const { format, input } = await loadInput(ref, options, logger);
    const context: ExtractContext = {
      logger,
      jsonlTextKey: options.jsonlTextKey ?? "text",
      stripBoilerplate: options.stripBoilerplate ?? true,
      onSkip: ({ unit, reason }) => outcome.skipped.push({ source: unit, reason, code: "EXTRACTION_FAILED" }),
    };

    const documents = await getExtractor(format).extract(input, context);
    for (const document of documents) {
      const records = chunkDocument(document, options, logger);
      if (records.length === 0) {
        logger.warn("Skipping document without text", { source: document.sourceId });
        outcome.skipped.push({ source: document.sourceId, reason: "no text after extraction" });
        continue;
      }
      logger.debug("Document chunked", { source: document.sourceId, chunks: records.length });
      outcome.documents++;
      outcome.records.push(...records);
    }
  } catch (error) {
    const skipped = skippedFrom(label, error);
    logger.warn("Skipping source", { source: label, code: skipped.code, reason: skipped.reason });
    outcome.skipped.push(skipped);
  }

  return outcome;
}

/**
 * Build the corpus file from the given sources.
 *
 * Sources are resolved in order and prepared up to `concurrency` at a
 * time. Each preparation returns all records of its source; a single
 * writer drains them strictly in resolution order, so the output is the
 * same for every run over the same input. Per-source problems are
 * recorded in `skipped`; an output that cannot be opened or written
 * rejects with OutputWriteError.
 */
export async function buildCorpus(sources: string[], options: BuildCorpusOptions): Promise<BuildCorpusResult> {
  const logger = options.logger ?? silentLogger;
  const concurrency = Math.max(1, options.concurrency ?? 4);

  return withSpan("corpus.build", async (span) => {
    const sinks: RecordSink[] = [await CorpusWriter.open(options.output)];
    if (options.markdownDir) {
      sinks.push(new MarkdownChunkWriter(options.markdownDir));
    }

    const result: BuildCorpusResult = {
      sourcesProcessed: 0,
      documentsProcessed: 0,
      chunksWritten: 0,
      skipped: [],
      segmentationMode: options.segmenter.mode,
    };

    const drain = async (outcome: SourceOutcome) => {
      for (const sink of sinks) {
        await sink.write(outcome.records);
      }
      if (outcome.documents > 0) {
        result.sourcesProcessed++;
        logger.info("Source written", { source: outcome.label, documents: outcome.documents, chunks: outcome.records.length });
      }
      result.documentsProcessed += outcome.documents;
      result.chunksWritten += outcome.records.length;
      result.skipped.push(...outcome.skipped);
    };

    const inFlight: Promise<SourceOutcome>[] = [];

    try {
      for (const source of sources) {
        logger.info("Processing source", { source });
        try {
          for await (const ref of resolveSources(source, { logger })) {
            inFlight.push(processSource(ref, options, logger));
            const head = inFlight.length >= concurrency ? inFlight.shift() : undefined;
            if (head) await drain(await head);
          }
        } catch (error) {
          if (error instanceof OutputWriteError) throw error;
          const skipped = skippedFrom(source, error);
          logger.warn("Skipping source", { source, code: skipped.code, reason: skipped.reason });
          result.skipped.push(skipped);
        }
      }

      for (const pending of inFlight.splice(0)) {
        await drain(await pending);
      }
    } catch (error) {
      await Promise.allSettled(sinks.map((sink) => sink.close()));
      throw error;
    }

    for (const sink of sinks) {
      await sink.close();
    }

    span.setAttribute("documents_processed", result.documentsProcessed);
    span.setAttribute("chunks_written", result.chunksWritten);
    span.setAttribute("sources_skipped", result.skipped.length);
    return result;
  });
}
