import type { Chunk, ChunkingConfig } from "@contract-qa/types";
import type { IChunker } from "./chunker.interface.js";
import { makeChunk, validateChunking } from "./chunk-window.js";

/**
 * Fixed character windows advancing by `chunkSize - overlap`.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, config: ChunkingConfig): Chunk[] {
    validateChunking(content, config);
    const { chunkSize, overlap } = config;
    const step = chunkSize - overlap;
    const results: Chunk[] = [];

    for (let startChar = 0; ; startChar += step) {
      const endChar = Math.min(startChar + chunkSize, content.length);
      results.push(makeChunk(content, results.length, startChar, endChar));
      if (endChar === content.length) break;
    }

    return results;
  }
}
