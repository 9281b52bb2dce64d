import type {
  ChunkingConfig,
  DocumentIndexSummary,
  DocumentInput,
  HistoryEntry,
  LegalResponse,
  RetrievalResult,
  ToolInvocation,
} from "@contract-qa/types";
import type { IChunker } from "@contract-qa/chunker";
import type { IEmbeddingProvider } from "@contract-qa/embeddings";
import type { IChatModel } from "@contract-qa/llm";
import type { ToolExecutor } from "@contract-qa/tools";
import type { IParser } from "@contract-qa/parser";
import type { IVectorStore } from "@contract-qa/vector-store";
import { AppError, ValidationError } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import { documentCacheKey } from "./document-key.js";
import { summarizeIndex } from "./document-index.js";
import type { DocumentIndex } from "./document-index.js";
import { IndexCache } from "./index-cache.js";
import { buildDocumentIndex } from "./ingestion-pipeline.js";
import { retrieve } from "./retrieval-pipeline.js";
import { composeAnswer } from "./answer-composer.js";
import { renderAnswer, renderEvidence } from "./render.js";

export interface SessionDependencies {
  cache: IndexCache;
  chunker: IChunker;
  chunking: ChunkingConfig;
  embeddingProvider: IEmbeddingProvider;
  chatModel: IChatModel;
  tools: ToolExecutor;
  topK: number;
  maxToolRounds: number;
  maxSchemaRetries: number;
  parser?: IParser;
  createStore?: () => IVectorStore;
  logger: Logger;
}

export interface OpenedDocument extends DocumentIndexSummary {
  /** True when the index came from the cache. */
  cached: boolean;
}

export type AskOutcome =
  | {
      status: "answered";
      answer: LegalResponse;
      /** Markdown summary, obligations and risks. */
      rendered: string;
      /** Markdown evidence lines. */
      evidence: string;
      retrieval: RetrievalResult;
      toolInvocations: ToolInvocation[];
      attempts: number;
    }
  | { status: "failed"; error: AppError };

/**
 * One user's conversation about one contract at a time. Holds the open
 * document's index and the chat history; indexes themselves live in the
 * shared cache.
 */
export class ContractSession {
  private index: DocumentIndex | undefined;
  private entries: HistoryEntry[] = [];
  private readonly logger: Logger;

  constructor(private readonly deps: SessionDependencies) {
    this.logger = deps.logger;
  }

  get document(): DocumentIndexSummary | undefined {
    return this.index ? summarizeIndex(this.index) : undefined;
  }

  get history(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  /**
   * Builds the document's index, or reuses the cached one. Errors propagate
   * and leave the previously open document in place.
   */
  async open(document: DocumentInput): Promise<OpenedDocument> {
    const { cache, chunking, embeddingProvider } = this.deps;
    const key = documentCacheKey(document.bytes, chunking, embeddingProvider.model);

    const { index, hit } = await cache.getOrBuild(key, () =>
      buildDocumentIndex(document, {
        chunker: this.deps.chunker,
        chunking,
        embeddingProvider,
        parser: this.deps.parser,
        createStore: this.deps.createStore,
        logger: this.logger,
      }),
    );

    if (this.index?.key !== index.key) {
      this.entries = [];
    }
    this.index = index;
    this.logger.info(
      { documentKey: key.slice(0, 12), chunks: index.chunks.length, cached: hit },
      "document opened",
    );
    return { ...summarizeIndex(index), name: document.name ?? index.name, cached: hit };
  }

  /**
   * Answers one question. Failures are returned rather than thrown and leave
   * the index and earlier history untouched.
   */
  async ask(query: string): Promise<AskOutcome> {
    const index = this.index;
    if (!index) {
      return {
        status: "failed",
        error: new ValidationError("Open a document before asking questions", {
          document: "none open",
        }),
      };
    }

    this.entries.push({ role: "user", content: query });
    try {
      const retrieval = await retrieve(query, index, {
        embeddingProvider: this.deps.embeddingProvider,
        topK: this.deps.topK,
        logger: this.logger,
      });
      const composed = await composeAnswer(query, retrieval.chunks, {
        chatModel: this.deps.chatModel,
        tools: this.deps.tools,
        maxToolRounds: this.deps.maxToolRounds,
        maxSchemaRetries: this.deps.maxSchemaRetries,
        logger: this.logger,
      });

      const rendered = renderAnswer(composed.answer);
      this.entries.push({ role: "assistant", content: rendered });
      return {
        status: "answered",
        answer: composed.answer,
        rendered,
        evidence: renderEvidence(composed.answer.supportingClauses),
        retrieval,
        toolInvocations: composed.toolInvocations,
        attempts: composed.attempts,
      };
    } catch (error: unknown) {
      if (!AppError.isAppError(error)) throw error;
      this.logger.warn({ err: error, code: error.code }, "query failed");
      return { status: "failed", error };
    }
  }

  clearHistory(): void {
    this.entries = [];
  }
}
