import type { Chunk, DocumentIndexSummary } from "@contract-qa/types";
import type { IVectorStore } from "@contract-qa/vector-store";

/** A loaded, chunked and embedded document. Never mutated once built. */
export interface DocumentIndex {
  key: string;
  name?: string;
  pageCount: number;
  chunks: readonly Chunk[];
  store: IVectorStore;
  embeddingModel: string;
  dimensions: number;
}

export function summarizeIndex(index: DocumentIndex): DocumentIndexSummary {
  return {
    documentKey: index.key,
    name: index.name,
    pageCount: index.pageCount,
    chunkCount: index.chunks.length,
    embeddingModel: index.embeddingModel,
    dimensions: index.dimensions,
  };
}
