import { readFile } from "node:fs/promises";
import { join } from "node:path";

export const ABBREVIATIONS_FILE = "abbreviations.txt";

// Stored without the final period, lower-cased.
export const COMMON_ABBREVIATIONS: ReadonlySet<string> = new Set([
  "mr", "mrs", "ms", "dr", "prof", "sr", "jr", "st", "mt", "gen", "gov", "sen", "rep",
  "vs", "etc", "e.g", "i.e", "cf", "al", "approx", "dept", "est", "fig", "no", "vol",
  "inc", "ltd", "co", "corp", "jan", "feb", "mar", "apr", "jun", "jul", "aug", "sep",
  "sept", "oct", "nov", "dec",
]);

export function normalizeAbbreviation(entry: string): string {
  return entry.trim().replace(/\.$/, "").toLowerCase();
}

/**
 * Read `abbreviations.txt` from a segmenter resource directory: one
 * abbreviation per line, `#` starts a comment.
 */
export async function loadAbbreviations(resourceDir: string): Promise<Set<string>> {
  const content = await readFile(join(resourceDir, ABBREVIATIONS_FILE), "utf-8");
  const entries = content
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, ""))
    .map(normalizeAbbreviation)
    .filter(Boolean);
  return new Set(entries);
}
