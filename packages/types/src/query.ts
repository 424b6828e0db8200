import type { Document } from "./document.js";

export const DEFAULT_TOP_K = 8;

export type SearchStrategyName =
  | "vector"
  | "token-suffix"
  | "project-keyword"
  | "any-term"
  | "any-document";

export interface SearchOptions {
  topK?: number;
  /** Hits scoring below this value are dropped. No filtering when omitted. */
  scoreThreshold?: number;
}

export interface SearchHit {
  document: Document;
  /** `1 - cosine_distance`; null for lexical matches. */
  score: number | null;
  strategy: SearchStrategyName;
}
