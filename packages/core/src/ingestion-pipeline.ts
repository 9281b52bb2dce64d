import type {
  Chunk,
  ChunkingConfig,
  DocumentInput,
  EmbeddingResult,
  ParseResult,
  VectorRecord,
} from "@contract-qa/types";
import type { IParser } from "@contract-qa/parser";
import { getParser } from "@contract-qa/parser";
import type { IChunker } from "@contract-qa/chunker";
import type { IEmbeddingProvider } from "@contract-qa/embeddings";
import type { IVectorStore } from "@contract-qa/vector-store";
import { InMemoryVectorStore } from "@contract-qa/vector-store";
import { EmbeddingError } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import { documentCacheKey } from "./document-key.js";
import type { DocumentIndex } from "./document-index.js";

export interface IngestionDependencies {
  chunker: IChunker;
  chunking: ChunkingConfig;
  embeddingProvider: IEmbeddingProvider;
  /** Overrides parser selection by MIME type. */
  parser?: IParser;
  createStore?: () => IVectorStore;
  logger: Logger;
  onParsed?: (result: ParseResult) => Promise<void>;
  onChunked?: (chunks: Chunk[]) => Promise<void>;
  onEmbedded?: (result: EmbeddingResult) => Promise<void>;
}

/**
 * Build phase: Parse -> Chunk -> Embed -> Index
 *
 * Nothing is returned until every chunk has a vector, so a failure in any
 * phase leaves no partial index behind.
 */
export async function buildDocumentIndex(
  input: DocumentInput,
  deps: IngestionDependencies,
): Promise<DocumentIndex> {
  const { logger } = deps;
  const key = documentCacheKey(input.bytes, deps.chunking, deps.embeddingProvider.model);
  const log = logger.child({ documentKey: key.slice(0, 12), name: input.name });

  // Phase 1: Parse
  let startTime = Date.now();
  const parser = deps.parser ?? getParser(input.mimeType);
  const parseResult = await parser.parse(input.bytes, input.mimeType);
  log.info({ pages: parseResult.pageCount, durationMs: Date.now() - startTime }, "document parsed");
  if (deps.onParsed) await deps.onParsed(parseResult);

  // Phase 2: Chunk
  startTime = Date.now();
  const chunks = deps.chunker.chunk(parseResult.text, deps.chunking);
  log.info(
    { chunks: chunks.length, strategy: deps.chunking.strategy, durationMs: Date.now() - startTime },
    "document chunked",
  );
  if (deps.onChunked) await deps.onChunked(chunks);

  // Phase 3: Embed
  startTime = Date.now();
  const embeddingResult = await deps.embeddingProvider.batchEmbed(chunks.map((c) => c.content));
  if (embeddingResult.embeddings.length !== chunks.length) {
    throw new EmbeddingError(
      `Expected ${chunks.length} embeddings, received ${embeddingResult.embeddings.length}`,
      deps.embeddingProvider.name,
    );
  }
  log.info(
    {
      model: embeddingResult.model,
      tokensUsed: embeddingResult.tokensUsed,
      durationMs: Date.now() - startTime,
    },
    "chunks embedded",
  );
  if (deps.onEmbedded) await deps.onEmbedded(embeddingResult);

  // Phase 4: Index
  const records: VectorRecord[] = chunks.map((chunk, i) => ({
    id: chunk.id,
    vector: embeddingResult.embeddings[i] ?? [],
    chunk,
  }));
  const store = deps.createStore ? deps.createStore() : new InMemoryVectorStore();
  await store.upsert(records);

  return {
    key,
    name: input.name,
    pageCount: parseResult.pageCount,
    chunks,
    store,
    embeddingModel: deps.embeddingProvider.model,
    dimensions: embeddingResult.dimensions,
  };
}
