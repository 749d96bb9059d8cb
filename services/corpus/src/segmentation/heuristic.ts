import { COMMON_ABBREVIATIONS } from "./abbreviations.js";
import { cutAt, tokenBefore } from "./boundaries.js";
import type { SentenceSegmenter } from "./types.js";

// Terminal punctuation, optional closing quotes/brackets, whitespace, then
// an uppercase letter (optionally behind an opening quote or bracket).
const BOUNDARY = /([.!?]+["')\]]*)\s+(?=["'(\[]?[A-Z])/g;

/**
 * Punctuation-based fallback. Splits after `.`, `!` or `?` followed by
 * whitespace and a capital letter, but not after a known abbreviation
 * ("Dr. Smith") or a single-letter initial ("J. Smith").
 */
export function createHeuristicSegmenter(
  extraAbbreviations: ReadonlySet<string> = new Set(),
): SentenceSegmenter {
  // Initials are capitals ("J. Smith"); a lower-case one-letter word ends a sentence ("option b.").
  const isAbbreviation = (token: string) => {
    const word = token.toLowerCase();
    return COMMON_ABBREVIATIONS.has(word) || extraAbbreviations.has(word) || /^[A-Z]$/.test(token);
  };

  return {
    mode: "heuristic",
    segment(text: string): string[] {
      const boundaries: number[] = [];
      const re = new RegExp(BOUNDARY.source, "g");
      let match: RegExpExecArray | null;

      while ((match = re.exec(text)) !== null) {
        const punctuation = match[1];
        const punctuationEnd = match.index + punctuation.length;
        if (punctuation === "." && isAbbreviation(tokenBefore(text, punctuationEnd))) {
          continue;
        }
        boundaries.push(match.index + match[0].length);
      }

      return cutAt(text, boundaries);
    },
  };
}
