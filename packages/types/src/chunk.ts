export type ChunkStrategy = "recursive" | "fixed";

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  /** Target chunk length in characters. */
  chunkSize: number;
  /** Characters shared by adjacent chunks. Must be smaller than chunkSize. */
  overlap: number;
}

export interface Chunk {
  id: string;
  index: number;
  content: string;
  startChar: number;
  endChar: number;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  chunk: Chunk;
}
