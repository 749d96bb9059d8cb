export { resolveSources } from "./resolver.js";
export type { ResolveOptions } from "./resolver.js";
export { fetchResource } from "./fetcher.js";
export type { FetchOptions } from "./fetcher.js";
export { charsetOf, formatForPath, formatForContentType, isUrl } from "./formats.js";
export type { SourceRef, FetchedResource } from "./types.js";
