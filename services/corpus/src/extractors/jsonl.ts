import { z } from "zod";
import { ExtractionError } from "../errors.js";
import { decodeText } from "./decode.js";
import type { Document, ExtractContext, Extractor, ExtractorInput } from "./types.js";

const JsonObject = z.record(z.string(), z.unknown());

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim() ? value : undefined;
}

/**
 * One document per JSON line, text taken from `context.jsonlTextKey`.
 * Lines that are not JSON objects, or lack a non-empty string under the
 * key, are skipped with a warning. A file whose every line is skipped
 * fails as a whole.
 */
export const jsonlExtractor: Extractor = {
  format: "jsonl",

  async extract(input: ExtractorInput, context: ExtractContext): Promise<Document[]> {
    const { logger, jsonlTextKey: key, onSkip } = context;
    const lines = decodeText(input.data, input.origin, input.charset).split(/\r?\n/);
    const documents: Document[] = [];
    let nonBlank = 0;

    const skip = (lineNumber: number, reason: string) => {
      const unit = `${input.origin}#L${lineNumber}`;
      logger.warn("Skipping JSONL record", { unit, reason });
      onSkip?.({ unit, reason });
    };

    for (const [index, line] of lines.entries()) {
      const lineNumber = index + 1;
      if (!line.trim()) continue;
      nonBlank++;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skip(lineNumber, "invalid JSON");
        continue;
      }

      const record = JsonObject.safeParse(parsed);
      if (!record.success) {
        skip(lineNumber, "not a JSON object");
        continue;
      }

      const text = stringField(record.data, key);
      if (!text) {
        skip(lineNumber, `no '${key}' field or empty`);
        continue;
      }

      const url = stringField(record.data, "url");
      documents.push({
        sourceId: `${input.sourceId}#L${lineNumber}`,
        origin: input.origin,
        format: "jsonl",
        rawText: text,
        title: stringField(record.data, "title") ?? stringField(record.data, "source") ?? input.name,
        metadata: url ? { url, line: lineNumber } : { line: lineNumber },
      });
    }

    if (nonBlank > 0 && documents.length === 0) {
      throw new ExtractionError(input.origin, `none of ${nonBlank} records carried a '${key}' field`);
    }

    return documents;
  },
};
