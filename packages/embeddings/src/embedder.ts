import { LRUCache } from "lru-cache";
import {
  EmbeddingUnavailableError,
  IntegrityError,
  RetryExhaustedError,
  ValidationError,
  withRetry,
} from "@factvault/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@factvault/logger";
import type {
  EmbedChunkFailure,
  EmbedManyResult,
  EmbeddingInputType,
  EmbeddingResult,
  IndexedVector,
} from "@factvault/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export const DEFAULT_CACHE_SIZE = 100;
export const DEFAULT_EMBED_BATCH_SIZE = 20;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

export type EmbeddingCache = LRUCache<string, number[]>;

export function createEmbeddingCache(max = DEFAULT_CACHE_SIZE): EmbeddingCache {
  return new LRUCache<string, number[]>({ max });
}

export interface EmbedderOptions {
  provider: IEmbeddingProvider;
  /**
   * Injected cache for document texts; a fresh one of `cacheSize` entries is
   * created when omitted. Query vectors get a cache of their own.
   */
  cache?: EmbeddingCache;
  cacheSize?: number;
  /** Texts per remote call in {@link Embedder.embedMany}. */
  batchSize?: number;
  /** Attempts per remote call, first call included. */
  maxAttempts?: number;
  /** Linear backoff base: the wait after attempt n is `retryDelayMs * n`. */
  retryDelayMs?: number;
  logger?: Logger;
}

interface PendingText {
  index: number;
  text: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Text-to-vector front end over an {@link IEmbeddingProvider}: validates input,
 * memoizes single texts, retries transient failures, and splits batches.
 */
export class Embedder {
  readonly provider: IEmbeddingProvider;
  readonly dimensions: number;
  private caches: Record<EmbeddingInputType, EmbeddingCache>;
  private inFlight: Record<EmbeddingInputType, Map<string, Promise<number[]>>> = {
    document: new Map(),
    query: new Map(),
  };
  private batchSize: number;
  private maxAttempts: number;
  private retryDelayMs: number;
  private logger: Logger;

  constructor(options: EmbedderOptions) {
    this.provider = options.provider;
    this.dimensions = options.provider.dimensions;
    this.caches = {
      document: options.cache ?? createEmbeddingCache(options.cacheSize),
      query: createEmbeddingCache(options.cacheSize),
    };
    this.batchSize = options.batchSize ?? DEFAULT_EMBED_BATCH_SIZE;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: "embedder",
      provider: options.provider.name,
    });

    if (!Number.isInteger(this.batchSize) || this.batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${String(this.batchSize)}`);
    }
  }

  /**
   * Embed one document text. Repeated texts are served from the cache;
   * concurrent calls for the same uncached text share one remote request.
   * Every caller gets its own copy of the vector.
   */
  embedOne(text: string): Promise<number[]> {
    return this.embedText(text, "document");
  }

  /** Like {@link embedOne}, for a search query. */
  embedQuery(text: string): Promise<number[]> {
    return this.embedText(text, "query");
  }

  /**
   * Embed many texts in chunks of `batchSize`. Empty texts are skipped; a chunk
   * that fails after retries is reported in `failures` without discarding the
   * vectors of other chunks.
   */
  async embedMany(texts: string[]): Promise<EmbedManyResult> {
    const skipped: number[] = [];
    const valid: PendingText[] = [];
    texts.forEach((text, index) => {
      if (text.trim().length === 0) {
        skipped.push(index);
      } else {
        valid.push({ index, text });
      }
    });

    const embeddings: IndexedVector[] = [];
    const failures: EmbedChunkFailure[] = [];

    for (let start = 0; start < valid.length; start += this.batchSize) {
      const chunk = valid.slice(start, start + this.batchSize);
      const indices = chunk.map((item) => item.index);

      let result: EmbeddingResult;
      try {
        result = await this.call(() => this.provider.batchEmbed(chunk.map((item) => item.text)));
      } catch (error: unknown) {
        this.logger.warn(
          { err: error, chunkStart: start, chunkSize: chunk.length },
          "embedding chunk failed, continuing with remaining chunks",
        );
        failures.push({ indices, error: toError(error) });
        continue;
      }

      if (result.embeddings.length !== chunk.length) {
        const error = new EmbeddingUnavailableError(
          `Embedding service returned ${String(result.embeddings.length)} vectors for ${String(chunk.length)} texts`,
          1,
        );
        this.logger.warn({ chunkStart: start }, error.message);
        failures.push({ indices, error });
        continue;
      }

      const vectors = result.embeddings;
      chunk.forEach((item, k) => {
        const vector = vectors[k] ?? [];
        this.assertDimensions(vector);
        embeddings.push({ index: item.index, vector });
      });
    }

    if (skipped.length > 0) {
      this.logger.debug({ skipped: skipped.length }, "skipped empty texts");
    }

    return { embeddings, embeddedCount: embeddings.length, skipped, failures };
  }

  /**
   * Number of memoized texts.
   */
  get cacheSize(): number {
    return this.caches.document.size + this.caches.query.size;
  }

  clearCache(): void {
    this.caches.document.clear();
    this.caches.query.clear();
  }

  private async embedText(text: string, inputType: EmbeddingInputType): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new ValidationError("Cannot embed empty text", { text: "Text must not be empty" });
    }

    const cached = this.caches[inputType].get(text);
    if (cached) {
      return [...cached];
    }

    const inFlight = this.inFlight[inputType];
    let request = inFlight.get(text);
    if (!request) {
      request = this.requestOne(text, inputType).finally(() => {
        inFlight.delete(text);
      });
      inFlight.set(text, request);
    }
    return [...(await request)];
  }

  private async requestOne(text: string, inputType: EmbeddingInputType): Promise<number[]> {
    const result = await this.call(() => this.provider.embed(text, inputType));
    const vector = result.embeddings[0];
    if (!vector) {
      throw new EmbeddingUnavailableError("Embedding service returned no vector", 1);
    }
    this.assertDimensions(vector);
    this.caches[inputType].set(text, vector);
    return vector;
  }

  private async call(fn: () => Promise<EmbeddingResult>): Promise<EmbeddingResult> {
    try {
      return await withRetry(fn, {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryDelayMs,
        maxDelayMs: Number.MAX_SAFE_INTEGER,
        backoff: "linear",
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            { err: error, attempt, maxAttempts: this.maxAttempts, delayMs },
            "embedding request failed, retrying",
          );
        },
      });
    } catch (error: unknown) {
      if (error instanceof RetryExhaustedError) {
        this.logger.error(
          { err: error.cause, attempts: error.attempts },
          "embedding request failed, giving up",
        );
        throw new EmbeddingUnavailableError(
          `Embedding failed after ${String(error.attempts)} attempts`,
          error.attempts,
          { cause: error.cause },
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error }, "embedding request rejected");
      throw new EmbeddingUnavailableError(`Embedding request rejected: ${reason}`, 1, {
        cause: error,
      });
    }
  }

  private assertDimensions(vector: number[]): void {
    if (vector.length !== this.dimensions) {
      throw new IntegrityError(
        `Embedding has ${String(vector.length)} dimensions, expected ${String(this.dimensions)}`,
        { details: { provider: this.provider.name } },
      );
    }
  }
}
