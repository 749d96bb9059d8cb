/**
 * Cut `text` at the given offsets. Pieces are trimmed and empty ones
 * dropped, so no character other than whitespace is ever lost.
 */
export function cutAt(text: string, boundaries: number[]): string[] {
  const sorted = [...new Set(boundaries)]
    .filter((b) => b > 0 && b < text.length)
    .sort((a, b) => a - b);

  const pieces: string[] = [];
  let start = 0;
  for (const end of [...sorted, text.length]) {
    const piece = text.slice(start, end).trim();
    if (piece) pieces.push(piece);
    start = end;
  }
  return pieces;
}

/** The word right before `offset` as written, without wrapping punctuation or its final period. */
export function tokenBefore(text: string, offset: number): string {
  const match = /(\S+)\s*$/.exec(text.slice(0, offset));
  if (!match) return "";
  return match[1]
    .replace(/^["'(\[]+/, "")
    .replace(/["')\]]+$/, "")
    .replace(/\.$/, "");
}

/** {@link tokenBefore}, lower-cased for abbreviation lookups. */
export function wordBefore(text: string, offset: number): string {
  return tokenBefore(text, offset).toLowerCase();
}
