import type { Chunk, VectorRecord } from "@contract-qa/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  chunk: Chunk;
}

export interface IVectorStore {
  /** Number of stored vectors. */
  readonly size: number;
  /** Dimensionality fixed by the first upsert; undefined while empty. */
  readonly dimensions: number | undefined;

  upsert(records: VectorRecord[]): Promise<void>;
  search(params: VectorSearchParams): Promise<VectorSearchResult[]>;
}
