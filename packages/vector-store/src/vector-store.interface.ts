import type { Document, DocumentRow } from "@factvault/types";

export interface SimilarityQuery {
  vector: number[];
  topK: number;
  /** Rows scoring below this are excluded. No filtering when omitted. */
  scoreThreshold?: number;
}

export interface ScoredDocument {
  document: Document;
  /** `1 - cosine_distance` */
  score: number;
}

/**
 * Persistence backend for documents and their vectors.
 *
 * Ordering contract: `list`, `findByContentPattern` and score ties in
 * `similaritySearch` follow first-insertion order of the id.
 */
export interface IVectorStore {
  readonly dimensions: number;

  /** Insert or replace by id. Returns the stored documents in input order. */
  upsert(rows: DocumentRow[]): Promise<Document[]>;
  /** Returns the ids that existed and were removed. */
  delete(ids: string[]): Promise<string[]>;
  get(id: string): Promise<Document | null>;
  count(): Promise<number>;
  similaritySearch(query: SimilarityQuery): Promise<ScoredDocument[]>;
  /** Case-insensitive SQL LIKE match against content (`%` any run, `_` one char, `\` escape). */
  findByContentPattern(pattern: string, limit: number): Promise<Document[]>;
  list(limit: number): Promise<Document[]>;
  ensureSchema(): Promise<void>;
  healthCheck(): Promise<boolean>;
}
