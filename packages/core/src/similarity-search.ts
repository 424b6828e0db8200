import type CircuitBreaker from "opossum";
import {
  AppError,
  PersistenceError,
  createCircuitBreaker,
  type CircuitBreakerOptions,
} from "@factvault/errors";
import type { Embedder } from "@factvault/embeddings";
import { createChildLogger, createSilentLogger, type Logger } from "@factvault/logger";
import { DEFAULT_TOP_K, type SearchHit, type SearchOptions } from "@factvault/types";
import type { IVectorStore, ScoredDocument, SimilarityQuery } from "@factvault/vector-store";
import {
  createDefaultStrategies,
  runLexicalFallback,
  type LexicalStrategy,
} from "./lexical-fallback.js";
import { toPersistenceError } from "./persistence.js";
import { parseInput, searchInputSchema } from "./validation.js";

export interface SimilaritySearchOptions {
  embedder: Embedder;
  store: IVectorStore;
  logger?: Logger;
  /** Used when a call passes no `topK`. */
  defaultTopK?: number;
  /** Replaces the default fallback chain. */
  strategies?: LexicalStrategy[];
  /** Rows scanned by the any-term step of the default chain. */
  fallbackScanLimit?: number;
  breaker?: CircuitBreakerOptions;
}

/**
 * Read path: ranks documents by cosine similarity to the query, and drops to
 * lexical matching when the vector path fails or finds nothing.
 */
export class SimilaritySearch {
  private embedder: Embedder;
  private store: IVectorStore;
  private logger: Logger;
  private defaultTopK: number;
  private strategies: readonly LexicalStrategy[];
  private breaker: CircuitBreaker<[SimilarityQuery], ScoredDocument[]>;

  constructor(options: SimilaritySearchOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.defaultTopK = options.defaultTopK ?? DEFAULT_TOP_K;
    this.strategies = options.strategies ?? createDefaultStrategies(options.fallbackScanLimit);
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: "similarity-search",
    });
    this.breaker = createCircuitBreaker(
      "vector-search",
      (query: SimilarityQuery) => this.store.similaritySearch(query),
      options.breaker,
      this.logger,
    );
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const input = parseInput(
      searchInputSchema,
      { query, topK: options.topK ?? this.defaultTopK, scoreThreshold: options.scoreThreshold },
      "Invalid search",
    );

    let vectorError: unknown;
    try {
      const vector = await this.embedder.embedQuery(input.query);
      const hits = await this.breaker.fire({
        vector,
        topK: input.topK,
        scoreThreshold: input.scoreThreshold,
      });
      if (hits.length > 0) {
        return hits.map(({ document, score }) => ({ document, score, strategy: "vector" }));
      }
      this.logger.info(
        { topK: input.topK },
        "vector search returned no rows, trying lexical fallback",
      );
    } catch (error: unknown) {
      if (error instanceof AppError && !error.isOperational) {
        throw error;
      }
      vectorError = error;
      this.logger.warn({ err: error }, "vector search failed, trying lexical fallback");
    }

    const fallback = await runLexicalFallback(
      input.query,
      input.topK,
      this.store,
      this.strategies,
      this.logger,
    );

    if (!fallback.storeReachable) {
      if (vectorError !== undefined) {
        throw toPersistenceError(vectorError, "search");
      }
      throw new PersistenceError(
        "search failed: store unreachable during lexical fallback",
        "search",
      );
    }

    const strategy = fallback.strategy;
    if (strategy === null) {
      return [];
    }
    return fallback.documents.map((document) => ({ document, score: null, strategy }));
  }

  /** Stops the circuit breaker's timers. */
  shutdown(): void {
    this.breaker.shutdown();
  }

  get circuitOpen(): boolean {
    return this.breaker.opened;
  }
}
