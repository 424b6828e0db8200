import type { DbClient } from "@factvault/db";
import type { IVectorStore } from "./vector-store.interface.js";
import { PgVectorStore } from "./pgvector-adapter.js";
import { InMemoryVectorStore } from "./memory-adapter.js";

export type { IVectorStore, SimilarityQuery, ScoredDocument } from "./vector-store.interface.js";
export { PgVectorStore } from "./pgvector-adapter.js";
export type { PgVectorStoreOptions } from "./pgvector-adapter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./memory-adapter.js";
export type { InMemoryVectorStoreOptions } from "./memory-adapter.js";
export { escapeLike, likeToRegExp } from "./pattern.js";
export { assertVectorDimensions, parseMetadata } from "./rows.js";

export type VectorStoreType = "pgvector" | "memory";

export interface VectorStoreConfig {
  type: VectorStoreType;
  dimensions: number;
  db?: DbClient;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "pgvector":
      if (!config.db) {
        throw new Error("db client is required for pgvector store");
      }
      return new PgVectorStore(config.db, { dimensions: config.dimensions });
    case "memory":
      return new InMemoryVectorStore({ dimensions: config.dimensions });
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
