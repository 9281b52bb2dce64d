import { z } from "zod";
import type { AppConfig } from "@contract-qa/types";
import { MissingCredentialError } from "@contract-qa/errors";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("info"),

    // ---------- OpenAI ----------
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-4o"),
    OPENAI_EMBED_MODEL: z.string().min(1).default("text-embedding-3-small"),
    LLM_TEMPERATURE: z
      .string()
      .default("0")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().min(1).default("embed-v4.0"),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["recursive", "fixed"]).default("recursive"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: nonNegativeInt("150"),

    // ---------- Retrieval & composition ----------
    RETRIEVAL_TOP_K: positiveInt("5"),
    MAX_TOOL_ROUNDS: nonNegativeInt("4"),
    MAX_SCHEMA_RETRIES: nonNegativeInt("2"),

    // ---------- Network & cache ----------
    REQUEST_TIMEOUT_MS: positiveInt("60000"),
    INDEX_CACHE_MAX_ENTRIES: positiveInt("8"),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

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

    openai: {
      apiKey: parsed.OPENAI_API_KEY ?? "",
      baseUrl: parsed.OPENAI_BASE_URL,
      chatModel: parsed.OPENAI_CHAT_MODEL,
      embedModel: parsed.OPENAI_EMBED_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
    },

    composer: {
      maxToolRounds: parsed.MAX_TOOL_ROUNDS,
      maxSchemaRetries: parsed.MAX_SCHEMA_RETRIES,
    },

    network: {
      requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    },

    cache: {
      maxEntries: parsed.INDEX_CACHE_MAX_ENTRIES,
    },
  };
}

/**
 * Names of the credentials the configured backends need that are still missing.
 * The chat model always runs on OpenAI; embeddings may run on Cohere instead.
 */
export function missingCredentials(config: AppConfig): string[] {
  const missing: string[] = [];
  if (config.openai.apiKey.trim().length === 0) {
    missing.push("OPENAI_API_KEY");
  }
  if (config.embedding.provider === "cohere" && config.cohere.apiKey.trim().length === 0) {
    missing.push("COHERE_API_KEY");
  }
  return missing;
}

/**
 * Precondition for any document work: every backend credential is present.
 */
export function assertCredentials(config: AppConfig): void {
  const [first] = missingCredentials(config);
  if (first !== undefined) {
    throw new MissingCredentialError(first);
  }
}
