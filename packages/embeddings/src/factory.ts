import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import type { OpenAIProviderConfig } from "./openai-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
import { HashingEmbeddingProvider } from "./hashing-provider.js";
import type { HashingProviderConfig } from "./hashing-provider.js";

export type EmbeddingProviderType = "openai" | "cohere" | "bge-m3" | "hashing";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  openai?: OpenAIProviderConfig;
  cohere?: CohereProviderConfig;
  bgeM3?: BgeM3ProviderConfig;
  hashing?: HashingProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider(config.openai);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "bge-m3":
      if (!config.bgeM3) {
        throw new Error("BGE-M3 config is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider(config.bgeM3);
    case "hashing":
      return new HashingEmbeddingProvider(config.hashing);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
