import type { Document, DocumentRow } from "@factvault/types";
import type {
  IVectorStore,
  ScoredDocument,
  SimilarityQuery,
} from "./vector-store.interface.js";
import { likeToRegExp } from "./pattern.js";
import { assertVectorDimensions } from "./rows.js";

interface Entry {
  seq: number;
  document: Document;
}

export interface InMemoryVectorStoreOptions {
  dimensions: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

function copy(document: Document): Document {
  return structuredClone(document);
}

/**
 * Process-local backend with brute-force cosine ranking. Holds the same
 * ordering contract as the pgvector store; used for tests and local runs.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly dimensions: number;
  private entries = new Map<string, Entry>();
  private nextSeq = 1;

  constructor(options: InMemoryVectorStoreOptions) {
    this.dimensions = options.dimensions;
  }

  async upsert(rows: DocumentRow[]): Promise<Document[]> {
    assertVectorDimensions(rows, this.dimensions);

    return rows.map((row) => {
      const existing = this.entries.get(row.id);
      const now = new Date();
      const document: Document = {
        id: row.id,
        content: row.content,
        vector: [...row.vector],
        metadata: structuredClone(row.metadata),
        createdAt: existing ? existing.document.createdAt : now,
        // never move backwards, even when two writes land in the same millisecond
        updatedAt: existing
          ? new Date(Math.max(now.getTime(), existing.document.updatedAt.getTime() + 1))
          : now,
      };
      this.entries.set(row.id, { seq: existing ? existing.seq : this.nextSeq++, document });
      return copy(document);
    });
  }

  async delete(ids: string[]): Promise<string[]> {
    const removed: string[] = [];
    for (const id of new Set(ids)) {
      if (this.entries.delete(id)) {
        removed.push(id);
      }
    }
    return removed;
  }

  async get(id: string): Promise<Document | null> {
    const entry = this.entries.get(id);
    return entry ? copy(entry.document) : null;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async similaritySearch(query: SimilarityQuery): Promise<ScoredDocument[]> {
    const { scoreThreshold } = query;
    return this.ordered()
      .map((document) => ({ document, score: cosineSimilarity(query.vector, document.vector) }))
      .filter((hit) => scoreThreshold === undefined || hit.score >= scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, query.topK)
      .map((hit) => ({ document: copy(hit.document), score: hit.score }));
  }

  async findByContentPattern(pattern: string, limit: number): Promise<Document[]> {
    const matcher = likeToRegExp(pattern);
    return this.ordered()
      .filter((document) => matcher.test(document.content))
      .slice(0, limit)
      .map(copy);
  }

  async list(limit: number): Promise<Document[]> {
    return this.ordered().slice(0, limit).map(copy);
  }

  async ensureSchema(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private ordered(): Document[] {
    return [...this.entries.values()]
      .sort((a, b) => a.seq - b.seq)
      .map((entry) => entry.document);
  }
}
