import { z } from "zod";

const ConfigSchema = z.object({
  // Chunking settings
  chunking: z.object({
    maxTokens: z.number().int().min(1).default(500),
    overlapSentences: z.number().int().min(0).default(2),
    tokenizer: z.enum(["words", "cl100k"]).default("words"),
    // Only used by the "words" tokenizer
    wordTokenRatio: z.number().positive().default(1),
  }),

  // JSONL passthrough: which field carries the text
  jsonl: z.object({
    textKey: z.string().min(1).default("text"),
  }),

  html: z.object({
    stripBoilerplate: z.boolean().default(true),
  }),

  // Remote sources
  fetch: z.object({
    timeoutMs: z.number().int().positive().default(15000),
    maxAttempts: z.number().int().min(1).default(3),
    minDelayMs: z.number().int().min(0).default(500),
    maxDelayMs: z.number().int().min(0).default(8000),
  }),

  segmenter: z.object({
    mode: z.enum(["auto", "heuristic"]).default("auto"),
    resourceDir: z.string().min(1).optional(),
  }),

  pipeline: z.object({
    concurrency: z.number().int().min(1).default(4),
  }),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TokenizerKind = Config["chunking"]["tokenizer"];
export type SegmenterMode = Config["segmenter"]["mode"];

/** Values given on the command line; they win over the environment. */
export interface ConfigOverrides {
  chunking?: Partial<Config["chunking"]>;
  jsonl?: Partial<Config["jsonl"]>;
  html?: Partial<Config["html"]>;
  fetch?: Partial<Config["fetch"]>;
  segmenter?: Partial<Config["segmenter"]>;
  pipeline?: Partial<Config["pipeline"]>;
  logLevel?: string;
}

function int(value: string | undefined): number | undefined {
  return value === undefined || value === "" ? undefined : Number.parseInt(value, 10);
}

function float(value: string | undefined): number | undefined {
  return value === undefined || value === "" ? undefined : Number.parseFloat(value);
}

function merge(base: Record<string, unknown>, override: object = {}): Record<string, unknown> {
  const result = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const fromEnv = {
    chunking: {
      maxTokens: int(env.CHUNK_MAX_TOKENS),
      overlapSentences: int(env.CHUNK_OVERLAP_SENTENCES),
      tokenizer: env.CHUNK_TOKENIZER || undefined,
      wordTokenRatio: float(env.CHUNK_WORD_TOKEN_RATIO),
    },
    jsonl: {
      textKey: env.JSONL_TEXT_KEY || undefined,
    },
    html: {
      stripBoilerplate: env.HTML_STRIP_BOILERPLATE !== "false",
    },
    fetch: {
      timeoutMs: int(env.FETCH_TIMEOUT_MS),
      maxAttempts: int(env.FETCH_MAX_ATTEMPTS),
      minDelayMs: int(env.FETCH_MIN_DELAY_MS),
      maxDelayMs: int(env.FETCH_MAX_DELAY_MS),
    },
    segmenter: {
      mode: env.SEGMENTER_MODE || undefined,
      resourceDir: env.SEGMENTER_RESOURCE_DIR || undefined,
    },
    pipeline: {
      concurrency: int(env.PIPELINE_CONCURRENCY),
    },
    logLevel: env.LOG_LEVEL || undefined,
  };

  return ConfigSchema.parse({
    chunking: merge(fromEnv.chunking, overrides.chunking),
    jsonl: merge(fromEnv.jsonl, overrides.jsonl),
    html: merge(fromEnv.html, overrides.html),
    fetch: merge(fromEnv.fetch, overrides.fetch),
    segmenter: merge(fromEnv.segmenter, overrides.segmenter),
    pipeline: merge(fromEnv.pipeline, overrides.pipeline),
    logLevel: overrides.logLevel ?? fromEnv.logLevel,
  });
}
