export type { JsonPrimitive, JsonValue, JsonObject } from "./json.js";
export type { Document, DocumentInput, DocumentRow } from "./document.js";
export type {
  EmbeddingInputType,
  EmbeddingResult,
  IndexedVector,
  EmbedChunkFailure,
  EmbedManyResult,
} from "./pipeline.js";
export { DEFAULT_TOP_K } from "./query.js";
export type { SearchStrategyName, SearchOptions, SearchHit } from "./query.js";
export type {
  AppConfig,
  DatabaseConfig,
  EmbeddingConfig,
  EmbeddingProviderName,
  OpenAIConfig,
  CohereConfig,
  BgeM3Config,
  SearchConfig,
  VectorStoreName,
} from "./config.js";
