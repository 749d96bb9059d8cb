export { CorpusWriter } from "./corpus-writer.js";
export { MarkdownChunkWriter, markdownPath, markdownStem } from "./markdown-writer.js";
export { buildRecords, recordId } from "./records.js";
export type { CorpusRecord, RecordSink } from "./types.js";
