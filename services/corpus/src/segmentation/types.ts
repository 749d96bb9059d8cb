export type SegmentationMode = "statistical" | "heuristic";

export interface SentenceSegmenter {
  readonly mode: SegmentationMode;
  /** Ordered sentences of `text`; joined with single spaces they give back the (normalized) input. */
  segment(text: string): string[];
}

/** Sentence texts as proposed by a statistical model, in order. */
export type SentenceModel = (text: string) => string[];
