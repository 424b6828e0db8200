import type { Logger } from "@factvault/logger";
import type { Document, DocumentRow, SearchStrategyName } from "@factvault/types";
import {
  escapeLike,
  type IVectorStore,
  type ScoredDocument,
  type SimilarityQuery,
} from "@factvault/vector-store";

export const DEFAULT_FALLBACK_SCAN_LIMIT = 100;
const MAX_SUFFIX_ATTEMPTS = 4;
const PROJECT_KEYWORD = "project";

export type LexicalStrategyName = Exclude<SearchStrategyName, "vector">;

/**
 * One step of the lexical fallback. Returns matching documents, or an empty
 * list to hand over to the next step.
 */
export interface LexicalStrategy {
  readonly name: LexicalStrategyName;
  /** Run only once an earlier step has thrown. */
  readonly afterFailureOnly?: boolean;
  find(query: string, topK: number, store: IVectorStore): Promise<Document[]>;
}

export interface LexicalFallbackResult {
  documents: Document[];
  /** Strategy that produced `documents`; null when none matched. */
  strategy: LexicalStrategyName | null;
  /** False when nothing matched, some step threw and no store call succeeded. */
  storeReachable: boolean;
}

export function queryWords(query: string): string[] {
  return query
    .toLowerCase()
    .replace(/[?.]/g, "")
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * `%w0%w1%…%`, then the same starting from w1, w2 and w3.
 */
export const tokenSuffixStrategy: LexicalStrategy = {
  name: "token-suffix",
  async find(query, topK, store) {
    const words = queryWords(query);
    for (let i = 0; i < Math.min(words.length, MAX_SUFFIX_ATTEMPTS); i++) {
      const pattern = `%${words.slice(i).map(escapeLike).join("%")}%`;
      const found = await store.findByContentPattern(pattern, topK);
      if (found.length > 0) {
        return found;
      }
    }
    return [];
  },
};

/**
 * Looks for "project <name>" where <name> is the token right after the first
 * occurrence of "project" in the query, taken as is.
 */
export const projectKeywordStrategy: LexicalStrategy = {
  name: "project-keyword",
  async find(query, topK, store) {
    const lowered = query.toLowerCase();
    const at = lowered.indexOf(PROJECT_KEYWORD);
    if (at < 0) {
      return [];
    }
    const [name] = lowered
      .slice(at + PROJECT_KEYWORD.length)
      .trim()
      .split(/\s+/);
    if (!name) {
      return [];
    }
    return store.findByContentPattern(`%${PROJECT_KEYWORD} ${escapeLike(name)}%`, topK);
  },
};

export function createAnyTermStrategy(scanLimit = DEFAULT_FALLBACK_SCAN_LIMIT): LexicalStrategy {
  return {
    name: "any-term",
    async find(query, topK, store) {
      const terms = new Set(queryWords(query));
      if (terms.size === 0) {
        return [];
      }
      const candidates = await store.list(scanLimit);
      return candidates
        .filter((document) => {
          const content = document.content.toLowerCase();
          return [...terms].some((term) => content.includes(term));
        })
        .slice(0, topK);
    },
  };
}

/**
 * Last resort after a failed step: whatever the store lists first. Skipped
 * when every earlier step ran cleanly and matched nothing.
 */
export const anyDocumentStrategy: LexicalStrategy = {
  name: "any-document",
  afterFailureOnly: true,
  async find(_query, topK, store) {
    return store.list(topK);
  },
};

export function createDefaultStrategies(
  scanLimit = DEFAULT_FALLBACK_SCAN_LIMIT,
): LexicalStrategy[] {
  return [
    tokenSuffixStrategy,
    projectKeywordStrategy,
    createAnyTermStrategy(scanLimit),
    anyDocumentStrategy,
  ];
}

/**
 * Records whether any read against the wrapped store succeeded.
 */
class TrackedStore implements IVectorStore {
  reached = false;

  constructor(private readonly inner: IVectorStore) {}

  get dimensions(): number {
    return this.inner.dimensions;
  }

  upsert(rows: DocumentRow[]): Promise<Document[]> {
    return this.track(this.inner.upsert(rows));
  }

  delete(ids: string[]): Promise<string[]> {
    return this.track(this.inner.delete(ids));
  }

  get(id: string): Promise<Document | null> {
    return this.track(this.inner.get(id));
  }

  count(): Promise<number> {
    return this.track(this.inner.count());
  }

  similaritySearch(query: SimilarityQuery): Promise<ScoredDocument[]> {
    return this.track(this.inner.similaritySearch(query));
  }

  findByContentPattern(pattern: string, limit: number): Promise<Document[]> {
    return this.track(this.inner.findByContentPattern(pattern, limit));
  }

  list(limit: number): Promise<Document[]> {
    return this.track(this.inner.list(limit));
  }

  ensureSchema(): Promise<void> {
    return this.track(this.inner.ensureSchema());
  }

  healthCheck(): Promise<boolean> {
    return this.track(this.inner.healthCheck());
  }

  private async track<T>(call: Promise<T>): Promise<T> {
    const result = await call;
    this.reached = true;
    return result;
  }
}

/**
 * Try each strategy in order; the first non-empty result wins. A strategy that
 * throws is logged and counts as empty, and unlocks the `afterFailureOnly`
 * steps after it.
 */
export async function runLexicalFallback(
  query: string,
  topK: number,
  store: IVectorStore,
  strategies: readonly LexicalStrategy[],
  logger: Logger,
): Promise<LexicalFallbackResult> {
  const tracked = new TrackedStore(store);
  let failed = 0;

  for (const strategy of strategies) {
    if (strategy.afterFailureOnly && failed === 0) {
      continue;
    }
    try {
      const documents = await strategy.find(query, topK, tracked);
      if (documents.length > 0) {
        logger.info(
          { strategy: strategy.name, results: documents.length },
          "lexical fallback matched",
        );
        return {
          documents: documents.slice(0, topK),
          strategy: strategy.name,
          storeReachable: true,
        };
      }
    } catch (error: unknown) {
      failed++;
      logger.warn({ err: error, strategy: strategy.name }, "lexical fallback strategy failed");
    }
  }

  return {
    documents: [],
    strategy: null,
    storeReachable: failed === 0 || tracked.reached,
  };
}
