import type { SegmenterMode } from "../config.js";
import { SegmentationDegraded, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { loadAbbreviations } from "./abbreviations.js";
import { createHeuristicSegmenter } from "./heuristic.js";
import { createStatisticalSegmenter, loadCompromiseModel } from "./statistical.js";
import type { SentenceModel, SentenceSegmenter } from "./types.js";

export { createHeuristicSegmenter } from "./heuristic.js";
export { createStatisticalSegmenter, locateBoundaries } from "./statistical.js";
export type { SentenceSegmenter, SentenceModel, SegmentationMode } from "./types.js";

export interface SegmenterInitOptions {
  mode?: SegmenterMode;
  /** Directory holding `abbreviations.txt`; when set, the file must be readable. */
  resourceDir?: string;
  logger?: Logger;
  /** Replaces the compromise model; such calls are not cached. */
  loadModel?: () => Promise<SentenceModel>;
}

const cache = new Map<string, Promise<SentenceSegmenter>>();

async function initialize(options: SegmenterInitOptions): Promise<SentenceSegmenter> {
  const { mode = "auto", resourceDir, logger = silentLogger, loadModel = loadCompromiseModel } = options;

  if (mode === "heuristic") {
    logger.info("Using heuristic sentence segmentation");
    return createHeuristicSegmenter();
  }

  let extraAbbreviations = new Set<string>();
  if (resourceDir) {
    try {
      extraAbbreviations = await loadAbbreviations(resourceDir);
    } catch (error) {
      return degrade(new SegmentationDegraded(`resource directory ${resourceDir} unreadable`, { cause: error }), logger);
    }
  }

  let model: SentenceModel;
  try {
    model = await loadModel();
  } catch (error) {
    return degrade(new SegmentationDegraded(errorMessage(error), { cause: error }), logger);
  }

  logger.debug("Statistical sentence model ready", { extraAbbreviations: extraAbbreviations.size });
  return createStatisticalSegmenter(model, extraAbbreviations);
}

function degrade(reason: SegmentationDegraded, logger: Logger): SentenceSegmenter {
  logger.warn(reason.message, { code: reason.code, cause: errorMessage(reason.cause) });
  return createHeuristicSegmenter();
}

/**
 * One-time segmenter setup, to run before any `segment` call. Repeated
 * calls with the same mode and resource directory share one instance.
 * Never rejects: when the model or its resources are unavailable the
 * heuristic segmenter is returned and a warning logged.
 */
export function initSegmenter(options: SegmenterInitOptions = {}): Promise<SentenceSegmenter> {
  if (options.loadModel) {
    return initialize(options);
  }
  const key = `${options.mode ?? "auto"}|${options.resourceDir ?? ""}`;
  let pending = cache.get(key);
  if (!pending) {
    pending = initialize(options);
    cache.set(key, pending);
  }
  return pending;
}

/** Reset the shared instances (for tests only). */
export function _resetSegmenterCache(): void {
  cache.clear();
}
