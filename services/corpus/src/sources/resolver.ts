import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { ExtractionError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isUrl } from "./formats.js";
import type { SourceRef } from "./types.js";

export interface ResolveOptions {
  logger?: Logger;
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Turn a command-line source into the files or URLs to process.
 * Directories are walked lazily and recursively; entries are visited sorted
 * by name so that repeated runs see the same sequence.
 */
export async function* resolveSources(
  input: string,
  options: ResolveOptions = {},
): AsyncGenerator<SourceRef> {
  const { logger = silentLogger } = options;

  if (isUrl(input)) {
    yield { kind: "url", url: input };
    return;
  }

  let info;
  try {
    info = await stat(input);
  } catch (error) {
    throw new ExtractionError(input, "no such file or directory", { cause: error });
  }

  if (info.isDirectory()) {
    yield* walkDirectory(input, logger);
  } else {
    yield { kind: "file", path: input };
  }
}

async function* walkDirectory(dir: string, logger: Logger): AsyncGenerator<SourceRef> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn("Skipping unreadable directory", { dir, error: String(error) });
    return;
  }

  for (const entry of entries.sort(byName)) {
    const fullPath = join(dir, entry.name);

    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();
    if (entry.isSymbolicLink()) {
      // Linked files are followed, linked directories are not (cycles)
      const target = await stat(fullPath).catch(() => null);
      if (!target) logger.warn("Skipping broken symbolic link", { path: fullPath });
      isDirectory = false;
      isFile = target?.isFile() ?? false;
    }

    if (isDirectory) {
      yield* walkDirectory(fullPath, logger);
    } else if (isFile) {
      yield { kind: "file", path: fullPath };
    }
  }
}
