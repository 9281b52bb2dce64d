export type {
  SupportedMimeType,
  DocumentInput,
  Page,
  ParseResult,
  DocumentIndexSummary,
} from "./document.js";
export type { ChunkStrategy, ChunkingConfig, Chunk, EmbeddingResult, VectorRecord } from "./chunk.js";
export type { RetrievedChunk, RetrievalResult } from "./query.js";
export type {
  ClauseReference,
  LegalResponse,
  ToolInvocation,
  ComposedAnswer,
  HistoryRole,
  HistoryEntry,
} from "./answer.js";
export type { ToolCall, ChatMessage, ToolSpec, ResponseSchema, ChatRequest, ChatTurn } from "./llm.js";
export type {
  EmbeddingProviderType,
  AppConfig,
  OpenAIConfig,
  CohereConfig,
  EmbeddingConfig,
  RetrievalConfig,
  ComposerConfig,
  NetworkConfig,
  CacheConfig,
} from "./config.js";
