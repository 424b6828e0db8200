import type { EmbeddingResult } from "@factvault/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { httpFailure, networkFailure } from "./http-errors.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
}

interface BgeM3Response {
  embeddings: number[][];
  tokens_used: number;
}

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, dimensions: this.dimensions }),
      });
    } catch (error: unknown) {
      throw networkFailure(this.name, error);
    }

    if (!response.ok) {
      throw httpFailure(this.name, response.status, response.statusText, await response.text());
    }

    const data = (await response.json()) as BgeM3Response;

    return {
      embeddings: data.embeddings,
      model: "bge-m3",
      tokensUsed: data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
