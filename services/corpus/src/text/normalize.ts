const DOUBLE_QUOTES = /[\u201C\u201D\u201E\u201F\u2033\u00AB\u00BB\uFF02]/g;
const SINGLE_QUOTES = /[\u2018\u2019\u201A\u201B\u2032\u2039\u203A\uFF07]/g;
const DASHES = /[\u2010\u2011\u2012\u2013\u2014\u2015\u2212\uFE58\uFE63\uFF0D]/g;
const ELLIPSIS = /\u2026/g;

// Zero-width characters, BOM and soft hyphen vanish outright.
const INVISIBLE = /[\u00AD\u200B\u200C\u200D\u2060\uFEFF]/g;

// C0 and C1 controls except tab, LF, VT, FF and CR, which the
// whitespace collapse turns into spaces.
const CONTROL = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F]/g;

/**
 * Canonical form of extracted text: NFC, ASCII quotes and hyphens,
 * no control characters, single spaces, trimmed.
 */
export function normalizeText(text: string): string {
  return text
    .normalize("NFC")
    .replace(INVISIBLE, "")
    .replace(CONTROL, "")
    .replace(DOUBLE_QUOTES, '"')
    .replace(SINGLE_QUOTES, "'")
    .replace(DASHES, "-")
    .replace(ELLIPSIS, "...")
    .replace(/\s+/g, " ")
    .trim();
}
