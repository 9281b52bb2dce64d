import type { Chunk, ChunkingConfig } from "@contract-qa/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): Chunk[];
}
