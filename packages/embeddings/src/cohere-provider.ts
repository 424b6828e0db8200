import { CohereClient, CohereError } from "cohere-ai";
import { EmbeddingRequestError, ExternalServiceError } from "@factvault/errors";
import type { EmbeddingInputType, EmbeddingResult } from "@factvault/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

const INPUT_TYPES = {
  document: "search_document",
  query: "search_query",
} as const satisfies Record<EmbeddingInputType, string>;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

function classifyCohereError(error: unknown): EmbeddingRequestError | ExternalServiceError {
  const message = error instanceof Error ? error.message : String(error);
  if (
    error instanceof CohereError &&
    error.statusCode !== undefined &&
    error.statusCode >= 400 &&
    error.statusCode < 500 &&
    error.statusCode !== 429
  ) {
    return new EmbeddingRequestError(message, "cohere", error.statusCode, { cause: error });
  }
  return new ExternalServiceError(message, "cohere", { cause: error });
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, inputType: EmbeddingInputType = "document"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(
    texts: string[],
    inputType: EmbeddingInputType = "document",
  ): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.v2
        .embed({
          texts: batch,
          model: this.model,
          inputType: INPUT_TYPES[inputType],
          embeddingTypes: ["float"],
        })
        .catch((error: unknown) => {
          throw classifyCohereError(error);
        });

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
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
