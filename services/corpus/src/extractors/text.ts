import { decodeText } from "./decode.js";
import type { Document, Extractor, ExtractorInput } from "./types.js";

export const textExtractor: Extractor = {
  format: "text",

  async extract(input: ExtractorInput): Promise<Document[]> {
    return [
      {
        sourceId: input.sourceId,
        origin: input.origin,
        format: "text",
        rawText: decodeText(input.data, input.origin, input.charset),
        title: input.name,
        metadata: input.url ? { url: input.url } : {},
      },
    ];
  },
};
