import type { Chunk } from "./chunk.js";

export interface RetrievedChunk {
  /** 1-based rank, used as the clause label in the model context. */
  rank: number;
  chunk: Chunk;
  score: number;
}

export interface RetrievalResult {
  query: string;
  chunks: RetrievedChunk[];
  retrievalTimeMs: number;
  tokensUsed: number;
}
