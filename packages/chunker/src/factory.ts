import type { ChunkStrategy } from "@contract-qa/types";
import type { IChunker } from "./chunker.interface.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "recursive":
      return new RecursiveChunker();
    case "fixed":
      return new FixedChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
