import type { Chunk, ChunkingOptions, Sentence } from "./types.js";

interface Buffered {
  sentence: Sentence;
  tokens: number;
}

function sumTokens(items: Buffered[]): number {
  return items.reduce((total, item) => total + item.tokens, 0);
}

/**
 * Group a document's sentences into token-budgeted chunks.
 *
 * Sentences are taken in order and never split. When the next sentence
 * would push the running chunk over `maxTokens`, the chunk is closed and
 * the next one starts with the last `overlapSentences` sentences of the
 * closed chunk (all of them when it has fewer), followed by the pending
 * sentence. The overlap counts toward the new chunk's budget, so further
 * sentences join only while the total stays within it. A sentence that
 * alone exceeds the budget becomes a chunk of its own and the chunk after
 * it starts empty.
 */
export function chunkSentences(
  sentences: Sentence[],
  sourceId: string,
  options: ChunkingOptions,
): Chunk[] {
  const { maxTokens, overlapSentences, estimateTokens, onOversized } = options;
  const chunks: Chunk[] = [];

  const emit = (items: Buffered[]) => {
    chunks.push({
      sentences: items.map((item) => item.sentence),
      chunkIndex: chunks.length,
      sourceId,
      tokenCount: sumTokens(items),
    });
  };

  let buffer: Buffered[] = [];
  let bufferTokens = 0;

  for (const sentence of sentences) {
    const tokens = estimateTokens(sentence.text);

    if (tokens > maxTokens) {
      if (buffer.length > 0) emit(buffer);
      onOversized?.(sentence, tokens);
      emit([{ sentence, tokens }]);
      buffer = [];
      bufferTokens = 0;
      continue;
    }

    if (buffer.length > 0 && bufferTokens + tokens > maxTokens) {
      emit(buffer);
      buffer = overlapSentences > 0 ? buffer.slice(-overlapSentences) : [];
      bufferTokens = sumTokens(buffer);
    }

    buffer.push({ sentence, tokens });
    bufferTokens += tokens;
  }

  if (buffer.length > 0) {
    emit(buffer);
  }

  return chunks;
}

export function chunkText(chunk: Chunk): string {
  return chunk.sentences.map((s) => s.text).join(" ");
}
