import { DocumentStore, SimilaritySearch } from "@factvault/core";
import { closeDbClient, createDbClient, type DbClient } from "@factvault/db";
import { Embedder, createEmbeddingProvider, type IEmbeddingProvider } from "@factvault/embeddings";
import type { Logger } from "@factvault/logger";
import type { AppConfig } from "@factvault/types";
import { createVectorStore, type IVectorStore } from "@factvault/vector-store";

export interface Services {
  provider: IEmbeddingProvider;
  embedder: Embedder;
  store: IVectorStore;
  documents: DocumentStore;
  search: SimilaritySearch;
  close(): Promise<void>;
}

export function createProvider(config: AppConfig["embedding"]): IEmbeddingProvider {
  const { model, dimensions } = config;
  return createEmbeddingProvider({
    provider: config.provider,
    openai: { apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl, model, dimensions },
    cohere: { apiKey: config.cohere.apiKey, model, dimensions },
    bgeM3: { baseUrl: config.bgeM3.url, dimensions },
    hashing: { dimensions },
  });
}

/**
 * Wire the embedder, backend, write path and read path from configuration.
 */
export function createServices(config: AppConfig, logger: Logger): Services {
  const provider = createProvider(config.embedding);
  const embedder = new Embedder({
    provider,
    cacheSize: config.embedding.cacheSize,
    batchSize: config.embedding.batchSize,
    maxAttempts: config.embedding.maxAttempts,
    retryDelayMs: config.embedding.retryDelayMs,
    logger,
  });

  let db: DbClient | undefined;
  if (config.vectorStore === "pgvector") {
    db = createDbClient({
      url: config.database.url,
      maxConnections: config.database.poolMax,
      idleTimeoutSeconds: config.database.idleTimeoutSeconds,
    });
  }
  const store = createVectorStore({
    type: config.vectorStore,
    dimensions: config.embedding.dimensions,
    db,
  });

  const documents = new DocumentStore({
    embedder,
    store,
    batchSize: config.embedding.batchSize,
    logger,
  });
  const search = new SimilaritySearch({
    embedder,
    store,
    logger,
    defaultTopK: config.search.topK,
    fallbackScanLimit: config.search.fallbackScanLimit,
  });

  return {
    provider,
    embedder,
    store,
    documents,
    search,
    async close() {
      search.shutdown();
      if (db) {
        await closeDbClient(db);
      }
    },
  };
}
