import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { z } from "zod";
import { ExtractionError, errorMessage } from "../errors.js";
import type { Document, ExtractContext, Extractor, ExtractorInput } from "./types.js";

const PdfInfo = z.object({ Title: z.string().optional() }).passthrough();

/**
 * Text of every page, in page order. Pages are joined with a line break,
 * which the normalizer folds into a space, so a sentence running across
 * a page break stays one sentence.
 */
export async function extractPdfPages(data: Uint8Array): Promise<{ pages: string[]; title?: string }> {
  // pdfjs takes ownership of the buffer it is given
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });
  const pdf = await loadingTask.promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : "") : ""))
        .join("");
      pages.push(text);
      page.cleanup();
    }

    const { info } = await pdf.getMetadata();
    const parsed = PdfInfo.safeParse(info);
    const title = parsed.success ? parsed.data.Title?.trim() || undefined : undefined;

    return { pages, title };
  } finally {
    await pdf.destroy();
  }
}

export const pdfExtractor: Extractor = {
  format: "pdf",

  async extract(input: ExtractorInput, context: ExtractContext): Promise<Document[]> {
    let extracted: { pages: string[]; title?: string };
    try {
      extracted = await extractPdfPages(input.data);
    } catch (error) {
      throw new ExtractionError(input.origin, `unreadable PDF (${errorMessage(error)})`, { cause: error });
    }

    context.logger.debug("PDF pages extracted", { origin: input.origin, pages: extracted.pages.length });

    return [
      {
        sourceId: input.sourceId,
        origin: input.origin,
        format: "pdf",
        rawText: extracted.pages.join("\n"),
        title: extracted.title ?? input.name,
        metadata: input.url ? { url: input.url } : {},
      },
    ];
  },
};
