import { getEncoding, type Tiktoken } from "js-tiktoken";
import type { TokenizerKind } from "../config.js";
import type { TokenEstimator } from "./types.js";

let encoder: Tiktoken | undefined;

// cl100k_base is used by text-embedding-3-* and GPT-4 models.
// Loading its ranks is slow, so it only happens on first use.
function cl100k(): Tiktoken {
  encoder ??= getEncoding("cl100k_base");
  return encoder;
}

/**
 * Count tokens in a string using the cl100k_base BPE tokenizer.
 */
export function countTokens(text: string): number {
  return cl100k().encode(text).length;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export interface TokenEstimatorOptions {
  tokenizer: TokenizerKind;
  wordTokenRatio?: number;
}

/**
 * Build the estimator used for a whole run. "words" scales the whitespace
 * word count by a fixed ratio and rounds up; "cl100k" runs the BPE encoder.
 */
export function createTokenEstimator(options: TokenEstimatorOptions): TokenEstimator {
  if (options.tokenizer === "cl100k") {
    return countTokens;
  }
  const ratio = options.wordTokenRatio ?? 1;
  return (text) => Math.ceil(countWords(text) * ratio);
}
