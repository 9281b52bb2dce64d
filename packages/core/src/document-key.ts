import { createHash } from "node:crypto";
import type { ChunkingConfig } from "@contract-qa/types";

/**
 * Content address of an index: the document bytes plus every parameter that
 * changes what gets indexed. Display names do not take part.
 */
export function documentCacheKey(
  bytes: Uint8Array,
  chunking: ChunkingConfig,
  embeddingModel: string,
): string {
  const contentHash = createHash("sha256").update(bytes).digest("hex");
  const params = JSON.stringify({
    strategy: chunking.strategy,
    chunkSize: chunking.chunkSize,
    overlap: chunking.overlap,
    embeddingModel,
  });
  return createHash("sha256").update(contentHash).update("\0").update(params).digest("hex");
}
