import { htmlExtractor } from "./html.js";
import { jsonlExtractor } from "./jsonl.js";
import { markdownExtractor } from "./markdown.js";
import { pdfExtractor } from "./pdf.js";
import { textExtractor } from "./text.js";
import type { DocumentFormat, Extractor } from "./types.js";

export type {
  Document,
  DocumentFormat,
  DocumentMetadata,
  ExtractContext,
  Extractor,
  ExtractorInput,
  SkippedUnit,
} from "./types.js";
export { DOCUMENT_FORMATS } from "./types.js";

/** One extractor per format. Supporting a new format means adding a variant here. */
export const EXTRACTORS: { readonly [F in DocumentFormat]: Extractor } = {
  html: htmlExtractor,
  pdf: pdfExtractor,
  markdown: markdownExtractor,
  text: textExtractor,
  jsonl: jsonlExtractor,
};

export function getExtractor(format: DocumentFormat): Extractor {
  return EXTRACTORS[format];
}
