import type { EmbeddingResult } from "@contract-qa/types";

export interface IEmbeddingProvider {
  readonly name: string;
  /** Model identifier; part of the index cache key. */
  readonly model: string;

  embed(text: string): Promise<EmbeddingResult>;
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
}
