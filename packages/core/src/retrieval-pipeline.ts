import type { RetrievalResult, RetrievedChunk } from "@contract-qa/types";
import type { IEmbeddingProvider } from "@contract-qa/embeddings";
import { EmbeddingError, ValidationError } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import type { DocumentIndex } from "./document-index.js";

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  topK: number;
  logger: Logger;
}

/**
 * Query phase: Query -> Embed -> Vector Search
 *
 * Read-only with respect to the index.
 */
export async function retrieve(
  query: string,
  index: DocumentIndex,
  deps: RetrievalDependencies,
): Promise<RetrievalResult> {
  const { logger } = deps;
  const startTime = Date.now();

  if (query.trim() === "") {
    throw new ValidationError("Query must not be empty", { query: "empty" });
  }
  if (deps.embeddingProvider.model !== index.embeddingModel) {
    throw new ValidationError("Query embedding model does not match the index", {
      embeddingModel: `index uses ${index.embeddingModel}, provider uses ${deps.embeddingProvider.model}`,
    });
  }

  // Same provider call as the build phase, so query and clauses share one space.
  const embeddingResult = await deps.embeddingProvider.embed(query);
  const queryVector = embeddingResult.embeddings[0];
  if (!queryVector) {
    throw new EmbeddingError("Failed to generate embedding for query", deps.embeddingProvider.name);
  }

  const searchResults = await index.store.search({ vector: queryVector, topK: deps.topK });

  const chunks: RetrievedChunk[] = searchResults.map((result, i) => ({
    rank: i + 1,
    chunk: result.chunk,
    score: result.score,
  }));

  const retrievalTimeMs = Date.now() - startTime;
  logger.info(
    { documentKey: index.key.slice(0, 12), retrieved: chunks.length, topK: deps.topK, retrievalTimeMs },
    "clauses retrieved",
  );

  return {
    query,
    chunks,
    retrievalTimeMs,
    tokensUsed: embeddingResult.tokensUsed,
  };
}
