export interface Sentence {
  text: string;
  position: number; // Index within the source document
}

export interface Chunk {
  sentences: Sentence[];
  chunkIndex: number;
  sourceId: string;
  tokenCount: number; // Sum of the sentences' token estimates
}

export type TokenEstimator = (text: string) => number;

export interface ChunkingOptions {
  maxTokens: number;
  overlapSentences: number;
  estimateTokens: TokenEstimator;
  /** Called for a sentence that alone exceeds `maxTokens` and becomes its own chunk. */
  onOversized?: (sentence: Sentence, tokens: number) => void;
}
