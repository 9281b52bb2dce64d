export type SupportedMimeType = "application/pdf" | "text/plain" | "text/markdown";

export interface DocumentInput {
  /** Raw bytes of the uploaded file. */
  bytes: Uint8Array;
  mimeType: string;
  /** Display name, usually the file name. Not part of the cache key. */
  name?: string;
}

export interface Page {
  /** 1-based page number. */
  index: number;
  text: string;
}

export interface ParseResult {
  pages: Page[];
  /** Pages joined in order with a blank line between them. */
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface DocumentIndexSummary {
  documentKey: string;
  name?: string;
  pageCount: number;
  chunkCount: number;
  embeddingModel: string;
  dimensions: number;
}
