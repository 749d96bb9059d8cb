export { buildCorpus } from "./build-corpus.js";
export type { BuildCorpusOptions, BuildCorpusResult, SkippedSource } from "./build-corpus.js";
