import type { Chunk, ChunkingConfig } from "@contract-qa/types";
import { EmptyInputError, ValidationError } from "@contract-qa/errors";

export function validateChunking(content: string, config: ChunkingConfig): void {
  const { chunkSize, overlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError("Invalid chunking config", {
      chunkSize: "must be a positive integer",
    });
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new ValidationError("Invalid chunking config", {
      overlap: "must be a non-negative integer smaller than chunkSize",
    });
  }
  if (content.length === 0) {
    throw new EmptyInputError();
  }
}

export function makeChunk(content: string, index: number, startChar: number, endChar: number): Chunk {
  return {
    id: `chunk-${String(index + 1)}`,
    index,
    content: content.slice(startChar, endChar),
    startChar,
    endChar,
  };
}
