import type { EmbeddingResult } from "@factvault/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { httpFailure, networkFailure } from "./http-errors.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  baseUrl?: string;
}

interface OpenAIEmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
  model: string;
  usage?: { prompt_tokens?: number; total_tokens?: number };
}

/**
 * OpenAI embeddings over the REST API. Any OpenAI-compatible server works through `baseUrl`.
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;
  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(config: OpenAIProviderConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          input: texts,
          encoding_format: "float",
        }),
      });
    } catch (error: unknown) {
      throw networkFailure(this.name, error);
    }

    if (!response.ok) {
      throw httpFailure(this.name, response.status, response.statusText, await response.text());
    }

    const data = (await response.json()) as OpenAIEmbeddingResponse;
    const ordered = [...data.data].sort((a, b) => a.index - b.index);

    return {
      embeddings: ordered.map((item) => item.embedding),
      model: data.model,
      tokensUsed: data.usage?.total_tokens ?? data.usage?.prompt_tokens ?? 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
