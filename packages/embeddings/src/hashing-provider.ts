import type { EmbeddingResult } from "@factvault/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 256;

export interface HashingProviderConfig {
  dimensions?: number;
}

function hashToken(token: string): number {
  let h = 0;
  for (let i = 0; i < token.length; i++) {
    h = (h * 31 + token.charCodeAt(i)) >>> 0;
  }
  return h;
}

/**
 * Offline bag-of-words embedding: each word is hashed into a bucket and the
 * vector is L2-normalised. Not semantic, but identical texts map to identical
 * vectors and shared words raise cosine similarity. Meant for local runs
 * against the in-memory store.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "hashing";
  readonly dimensions: number;

  constructor(config: HashingProviderConfig = {}) {
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map((text) => this.vectorize(text)),
      model: "hashing",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
      .split(/\s+/)
      .filter((token) => token.length > 0);

    for (const token of tokens) {
      const bucket = hashToken(token) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0)) || 1;
    return vector.map((v) => v / norm);
  }
}
