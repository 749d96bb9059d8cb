import { ZodError } from "zod";
import { createTokenEstimator } from "./chunking/tokenizer.js";
import { loadConfig, type Config, type ConfigOverrides } from "./config.js";
import { NoDocumentsError, OutputWriteError } from "./errors.js";
import { createLogger } from "./logger.js";
import { buildCorpus } from "./pipeline/index.js";
import { initSegmenter } from "./segmentation/index.js";
import { initTracing, shutdownTracing } from "./tracing.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliArgs =
  | { help: true }
  | {
      help: false;
      sources: string[];
      output: string;
      markdownDir?: string;
      overrides: ConfigOverrides;
    };

export function printHelp(): void {
  console.log(`
corpus-prep - turn documents into a sentence-chunked JSONL corpus

Usage:
  corpus-prep <source...> <output> [options]

  Each source is a file, a directory (walked recursively) or an http(s) URL.
  Supported formats: .html .htm .xhtml .pdf .md .markdown .txt .jsonl .ndjson
  The last positional argument is the output file; it is overwritten.

Options:
  --max-tokens <int>              Token budget per chunk (default: 500)
  --overlap-sentences <int>       Sentences repeated at the start of the next chunk (default: 2)
  --jsonl-key <key>               JSONL field holding the text (default: text)
  --tokenizer <words|cl100k>      Token estimate (default: words)
  --word-token-ratio <number>     Tokens per word for the words tokenizer (default: 1)
  --concurrency <int>             Documents prepared in parallel (default: 4)
  --markdown-dir <dir>            Also write every chunk as a Markdown file
  --segmenter <auto|heuristic>    Sentence segmentation (default: auto)
  --segmenter-resources <dir>     Directory holding abbreviations.txt
  --fetch-timeout <ms>            Timeout per HTTP attempt (default: 15000)
  --fetch-retries <int>           Retries after a failed HTTP attempt (default: 2)
  --log-level <level>             debug, info, warn or error (default: info)
  --help                          Show this help

Environment variables:
  CHUNK_MAX_TOKENS, CHUNK_OVERLAP_SENTENCES, CHUNK_TOKENIZER, CHUNK_WORD_TOKEN_RATIO,
  JSONL_TEXT_KEY, HTML_STRIP_BOILERPLATE, FETCH_TIMEOUT_MS, FETCH_MAX_ATTEMPTS,
  FETCH_MIN_DELAY_MS, FETCH_MAX_DELAY_MS, SEGMENTER_MODE, SEGMENTER_RESOURCE_DIR,
  PIPELINE_CONCURRENCY, LOG_LEVEL
  Command-line options win over the environment.

Examples:
  corpus-prep ./docs corpus.jsonl
  corpus-prep ./docs https://example.com/guide.html corpus.jsonl --max-tokens 300
  corpus-prep data.jsonl corpus.jsonl --jsonl-key body --markdown-dir ./chunks
`);
}

/**
 * Parse the command line. Numeric values are passed on unchecked; the
 * config schema rejects what is out of range.
 */
export function parseArgs(argv: string[]): CliArgs {
  const positionals: string[] = [];
  const overrides: ConfigOverrides = {
    chunking: {},
    jsonl: {},
    fetch: {},
    segmenter: {},
    pipeline: {},
  };
  let markdownDir: string | undefined;

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      return { help: true };
    }

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      i++;
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`Missing value for ${arg}`);
    }

    switch (arg) {
      case "--max-tokens":
        overrides.chunking = { ...overrides.chunking, maxTokens: Number(value) };
        break;
      case "--overlap-sentences":
        overrides.chunking = { ...overrides.chunking, overlapSentences: Number(value) };
        break;
      case "--tokenizer":
        if (value !== "words" && value !== "cl100k") {
          throw new UsageError(`Invalid --tokenizer value: ${value}. Must be words or cl100k.`);
        }
        overrides.chunking = { ...overrides.chunking, tokenizer: value };
        break;
      case "--word-token-ratio":
        overrides.chunking = { ...overrides.chunking, wordTokenRatio: Number(value) };
        break;
      case "--jsonl-key":
        overrides.jsonl = { textKey: value };
        break;
      case "--concurrency":
        overrides.pipeline = { concurrency: Number(value) };
        break;
      case "--markdown-dir":
        markdownDir = value;
        break;
      case "--segmenter":
        if (value !== "auto" && value !== "heuristic") {
          throw new UsageError(`Invalid --segmenter value: ${value}. Must be auto or heuristic.`);
        }
        overrides.segmenter = { ...overrides.segmenter, mode: value };
        break;
      case "--segmenter-resources":
        overrides.segmenter = { ...overrides.segmenter, resourceDir: value };
        break;
      case "--fetch-timeout":
        overrides.fetch = { ...overrides.fetch, timeoutMs: Number(value) };
        break;
      case "--fetch-retries":
        overrides.fetch = { ...overrides.fetch, maxAttempts: Number(value) + 1 };
        break;
      case "--log-level":
        overrides.logLevel = value;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
    i += 2; // consume the flag and its value
  }

  if (positionals.length < 2) {
    throw new UsageError("Expected at least one source and an output file");
  }

  const output = positionals[positionals.length - 1];
  return {
    help: false,
    sources: positionals.slice(0, -1),
    output,
    markdownDir,
    overrides,
  };
}

function describeZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  /** Log sink; defaults to stderr. */
  logOutput?: (line: string) => void;
}

/** Runs one invocation and resolves with the process exit code. */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error('Run with "--help" to see available options.');
    return 1;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  let config: Config;
  try {
    config = loadConfig(args.overrides, options.env);
  } catch (error) {
    if (!(error instanceof ZodError)) throw error;
    console.error(`Invalid configuration: ${describeZodError(error)}`);
    return 1;
  }

  const logger = createLogger({ level: config.logLevel, output: options.logOutput });
  await initTracing();

  try {
    const segmenter = await initSegmenter({
      mode: config.segmenter.mode,
      resourceDir: config.segmenter.resourceDir,
      logger,
    });

    const result = await buildCorpus(args.sources, {
      output: args.output,
      markdownDir: args.markdownDir,
      maxTokens: config.chunking.maxTokens,
      overlapSentences: config.chunking.overlapSentences,
      estimateTokens: createTokenEstimator(config.chunking),
      segmenter,
      jsonlTextKey: config.jsonl.textKey,
      stripBoilerplate: config.html.stripBoilerplate,
      fetch: config.fetch,
      concurrency: config.pipeline.concurrency,
      logger,
    });

    logger.info("Corpus complete", {
      output: args.output,
      sources: result.sourcesProcessed,
      documents: result.documentsProcessed,
      chunks: result.chunksWritten,
      skipped: result.skipped.length,
      segmentation: result.segmentationMode,
    });
    if (result.skipped.length > 0) {
      logger.warn("Skipped sources", { sources: result.skipped.map((s) => `${s.source} (${s.reason})`) });
    }

    if (result.documentsProcessed === 0) {
      const error = new NoDocumentsError(args.sources);
      logger.error(error.message, { code: error.code });
      return 1;
    }
    return 0;
  } catch (error) {
    if (!(error instanceof OutputWriteError)) throw error;
    logger.error(error.message, { code: error.code });
    return 1;
  } finally {
    await shutdownTracing();
  }
}
