import { TextDecoder } from "node:util";
import { ExtractionError } from "../errors.js";

/**
 * Strict decoding with the given character set label (a `Content-Type`
 * charset), UTF-8 when there is none. A leading UTF-8 BOM is dropped.
 */
export function decodeText(data: Uint8Array, source: string, charset = "utf-8"): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true });
  } catch (error) {
    throw new ExtractionError(source, `unsupported charset '${charset}'`, { cause: error });
  }

  try {
    return decoder.decode(data);
  } catch (error) {
    const label = decoder.encoding === "utf-8" ? "UTF-8" : decoder.encoding;
    throw new ExtractionError(source, `content is not valid ${label}`, { cause: error });
  }
}
