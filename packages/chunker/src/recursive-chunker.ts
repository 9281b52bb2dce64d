import type { Chunk, ChunkingConfig } from "@contract-qa/types";
import type { IChunker } from "./chunker.interface.js";
import { makeChunk, validateChunking } from "./chunk-window.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " "];

/**
 * Sliding window that prefers to end on the largest natural boundary in the
 * back half of the window (paragraph, then line, then sentence, then word),
 * falling back to a hard cut. Each chunk starts exactly `overlap` characters
 * before the previous one ended, so removing that overlap from every
 * non-final chunk reproduces the input.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = (separators ?? DEFAULT_SEPARATORS).filter((s) => s.length > 0);
  }

  chunk(content: string, config: ChunkingConfig): Chunk[] {
    validateChunking(content, config);
    const { chunkSize, overlap } = config;
    const results: Chunk[] = [];

    let startChar = 0;
    for (;;) {
      const hardEnd = startChar + chunkSize;
      if (hardEnd >= content.length) {
        results.push(makeChunk(content, results.length, startChar, content.length));
        break;
      }

      const minEnd = startChar + Math.max(overlap, Math.floor(chunkSize / 2));
      const endChar = this.findBoundary(content, minEnd, hardEnd) ?? hardEnd;
      results.push(makeChunk(content, results.length, startChar, endChar));
      startChar = endChar - overlap;
    }

    return results;
  }

  /**
   * Position just past the last occurrence of the highest-priority separator
   * that ends inside (minEnd, maxEnd].
   */
  private findBoundary(text: string, minEnd: number, maxEnd: number): number | undefined {
    for (const separator of this.separators) {
      const at = text.lastIndexOf(separator, maxEnd - separator.length);
      if (at < 0) continue;
      const end = at + separator.length;
      if (end > minEnd && end <= maxEnd) return end;
    }
    return undefined;
  }
}
