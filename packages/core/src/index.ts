export { DocumentStore, DEFAULT_WRITE_BATCH_SIZE } from "./document-store.js";
export type { DocumentStoreOptions } from "./document-store.js";

export { SimilaritySearch } from "./similarity-search.js";
export type { SimilaritySearchOptions } from "./similarity-search.js";

export {
  runLexicalFallback,
  createDefaultStrategies,
  createAnyTermStrategy,
  tokenSuffixStrategy,
  projectKeywordStrategy,
  anyDocumentStrategy,
  queryWords,
  DEFAULT_FALLBACK_SCAN_LIMIT,
} from "./lexical-fallback.js";
export type {
  LexicalStrategy,
  LexicalStrategyName,
  LexicalFallbackResult,
} from "./lexical-fallback.js";

export {
  parseInput,
  documentInputSchema,
  batchInputSchema,
  searchInputSchema,
  metadataSchema,
  jsonValueSchema,
} from "./validation.js";
