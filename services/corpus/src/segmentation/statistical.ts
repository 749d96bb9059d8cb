import { z } from "zod";
import { cutAt, wordBefore } from "./boundaries.js";
import type { SentenceModel, SentenceSegmenter } from "./types.js";

const SentenceList = z.array(z.string());

/**
 * Wraps the compromise NLP library as a sentence model. Its lexicon knows
 * honorifics, abbreviations, initials and decimal numbers, so "Dr. Smith"
 * and "3.5" do not end a sentence.
 */
export async function loadCompromiseModel(): Promise<SentenceModel> {
  const { default: nlp } = await import("compromise");
  return (text) => SentenceList.parse(nlp(text).sentences().out("array"));
}

// How many leading words identify a sentence's start in the source text.
const PROBE_WORDS = 3;

/**
 * Find where each model sentence starts in `text`. Sentence texts are
 * searched in order from a moving cursor; a sentence that cannot be
 * located contributes no boundary and stays merged with its predecessor.
 */
export function locateBoundaries(text: string, sentences: string[]): number[] {
  const boundaries: number[] = [];
  let cursor = 0;

  for (const sentence of sentences) {
    const trimmed = sentence.trim();
    if (!trimmed) continue;

    const probe = trimmed.split(/\s+/).slice(0, PROBE_WORDS).join(" ");
    const at = text.indexOf(probe, cursor);
    if (at < 0) continue;

    boundaries.push(at);
    cursor = text.startsWith(trimmed, at) ? at + trimmed.length : at + probe.length;
  }

  return boundaries;
}

/**
 * Statistical segmentation. Boundaries proposed by the model that directly
 * follow one of `extraAbbreviations` are ignored.
 */
export function createStatisticalSegmenter(
  model: SentenceModel,
  extraAbbreviations: ReadonlySet<string> = new Set(),
): SentenceSegmenter {
  return {
    mode: "statistical",
    segment(text: string): string[] {
      if (!text.trim()) return [];
      const boundaries = locateBoundaries(text, model(text)).filter(
        (offset) => !extraAbbreviations.has(wordBefore(text, offset)),
      );
      return cutAt(text, boundaries);
    },
  };
}
