import { z } from "zod";
import type { AppConfig } from "@factvault/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for the environment. Validates, transforms, and provides
 * defaults so that the resulting object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Storage ----------
    VECTOR_STORE: z.enum(["pgvector", "memory"]).default("pgvector"),
    DATABASE_URL: z
      .string()
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      })
      .optional(),
    DATABASE_POOL_MAX: positiveInt("10"),
    DATABASE_IDLE_TIMEOUT_S: nonNegativeInt("20"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere", "bge-m3", "hashing"]).default("openai"),
    EMBED_MODEL: z.string().min(1).optional(),
    EMBED_DIMENSIONS: positiveInt("1536"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
    COHERE_API_KEY: z.string().optional(),
    BGE_M3_URL: z.string().url().optional(),
    EMBED_CACHE_SIZE: positiveInt("100"),
    EMBED_BATCH_SIZE: positiveInt("20"),
    EMBED_MAX_ATTEMPTS: positiveInt("3"),
    EMBED_RETRY_DELAY_MS: nonNegativeInt("2000"),

    // ---------- Search ----------
    SEARCH_TOP_K: positiveInt("8"),
    FALLBACK_SCAN_LIMIT: positiveInt("100"),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_STORE === "pgvector" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when VECTOR_STORE is pgvector",
      });
    }
    if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when EMBEDDING_PROVIDER is openai",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
  });

const DEFAULT_MODELS: Record<AppConfig["embedding"]["provider"], string> = {
  openai: "text-embedding-3-small",
  cohere: "embed-v4.0",
  "bge-m3": "bge-m3",
  hashing: "hashing",
};

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL ?? "",
      poolMax: parsed.DATABASE_POOL_MAX,
      idleTimeoutSeconds: parsed.DATABASE_IDLE_TIMEOUT_S,
    },

    vectorStore: parsed.VECTOR_STORE,

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBED_MODEL ?? DEFAULT_MODELS[parsed.EMBEDDING_PROVIDER],
      dimensions: parsed.EMBED_DIMENSIONS,
      openai: {
        apiKey: parsed.OPENAI_API_KEY ?? "",
        baseUrl: parsed.OPENAI_BASE_URL,
      },
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
      },
      bgeM3: {
        url: parsed.BGE_M3_URL ?? "",
      },
      cacheSize: parsed.EMBED_CACHE_SIZE,
      batchSize: parsed.EMBED_BATCH_SIZE,
      maxAttempts: parsed.EMBED_MAX_ATTEMPTS,
      retryDelayMs: parsed.EMBED_RETRY_DELAY_MS,
    },

    search: {
      topK: parsed.SEARCH_TOP_K,
      fallbackScanLimit: parsed.FALLBACK_SCAN_LIMIT,
    },
  };
}
