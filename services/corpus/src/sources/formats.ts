import { extname } from "node:path";
import type { DocumentFormat } from "../extractors/types.js";

const EXTENSION_FORMATS = new Map<string, DocumentFormat>([
  [".html", "html"],
  [".htm", "html"],
  [".xhtml", "html"],
  [".pdf", "pdf"],
  [".md", "markdown"],
  [".markdown", "markdown"],
  [".txt", "text"],
  [".jsonl", "jsonl"],
  [".ndjson", "jsonl"],
]);

const MIME_FORMATS = new Map<string, DocumentFormat>([
  ["text/html", "html"],
  ["application/xhtml+xml", "html"],
  ["application/pdf", "pdf"],
  ["text/markdown", "markdown"],
  ["text/x-markdown", "markdown"],
  ["application/jsonl", "jsonl"],
  ["application/jsonlines", "jsonl"],
  ["application/x-jsonlines", "jsonl"],
  ["application/x-ndjson", "jsonl"],
]);

export function formatForPath(path: string): DocumentFormat | undefined {
  return EXTENSION_FORMATS.get(extname(path).toLowerCase());
}

/**
 * Format of a fetched resource. A specific media type wins; generic ones
 * (text/plain, application/octet-stream) defer to the URL's extension.
 * A response without any media type is treated as a web page.
 */
export function formatForContentType(contentType: string | undefined, url: string): DocumentFormat | undefined {
  const mime = contentType?.split(";")[0]?.trim().toLowerCase() ?? "";
  const specific = MIME_FORMATS.get(mime);
  if (specific) return specific;

  const fromPath = formatForPath(new URL(url).pathname);
  if (fromPath) return fromPath;

  if (mime === "text/plain") return "text";
  if (mime === "") return "html";
  return undefined;
}

/** The `charset` parameter of a `Content-Type` header, lower-cased. */
export function charsetOf(contentType: string | undefined): string | undefined {
  const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? "");
  return match ? match[1].toLowerCase() : undefined;
}

export function isUrl(input: string): boolean {
  return /^https?:\/\//i.test(input);
}
