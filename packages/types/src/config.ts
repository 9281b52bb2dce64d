import type { ChunkingConfig } from "./chunk.js";

export type EmbeddingProviderType = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "trace" | "debug" | "info" | "warn" | "error" | "silent";
  openai: OpenAIConfig;
  cohere: CohereConfig;
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  composer: ComposerConfig;
  network: NetworkConfig;
  cache: CacheConfig;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  chatModel: string;
  embedModel: string;
  temperature: number;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
}

export interface RetrievalConfig {
  topK: number;
}

export interface ComposerConfig {
  maxToolRounds: number;
  maxSchemaRetries: number;
}

export interface NetworkConfig {
  requestTimeoutMs: number;
}

export interface CacheConfig {
  maxEntries: number;
}
