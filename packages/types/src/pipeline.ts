/** Models such as Cohere's embed passages and search queries differently. */
export type EmbeddingInputType = "document" | "query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IndexedVector {
  /** Position of the text in the caller's input list. */
  index: number;
  vector: number[];
}

export interface EmbedChunkFailure {
  /** Input positions covered by the chunk that could not be embedded. */
  indices: number[];
  error: Error;
}

export interface EmbedManyResult {
  embeddings: IndexedVector[];
  embeddedCount: number;
  skipped: number[];
  failures: EmbedChunkFailure[];
}
