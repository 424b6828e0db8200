export type EmbeddingProviderName = "openai" | "cohere" | "bge-m3" | "hashing";

export type VectorStoreName = "pgvector" | "memory";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  vectorStore: VectorStoreName;
  embedding: EmbeddingConfig;
  search: SearchConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
  idleTimeoutSeconds: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
  openai: OpenAIConfig;
  cohere: CohereConfig;
  bgeM3: BgeM3Config;
  cacheSize: number;
  batchSize: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl: string;
}

export interface CohereConfig {
  apiKey: string;
}

export interface BgeM3Config {
  url: string;
}

export interface SearchConfig {
  topK: number;
  fallbackScanLimit: number;
}
