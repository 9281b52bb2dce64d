import { CohereClient } from "cohere-ai";
import type CircuitBreaker from "opossum";
import type { EmbeddingResult } from "@contract-qa/types";
import { createCircuitBreaker, withRetry } from "@contract-qa/errors";
import type { RetryOptions } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { isCredentialFailure, toBatches, toEmbeddingError } from "./batching.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

interface CohereEmbedResponse {
  embeddings: { float?: number[][] };
  meta?: { billedUnits?: { inputTokens?: number } };
}

/** The slice of the Cohere SDK this provider calls. */
export interface CohereEmbedClient {
  v2: {
    embed(request: {
      texts: string[];
      model: string;
      inputType: "search_document";
      embeddingTypes: "float"[];
    }): Promise<CohereEmbedResponse>;
  };
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
  logger?: Logger;
  client?: CohereEmbedClient;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  private client: CohereEmbedClient;
  private breaker: CircuitBreaker<[string[]], CohereEmbedResponse>;
  private retry: RetryOptions;
  private logger: Logger | undefined;

  constructor(config: CohereProviderConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.logger = config.logger;
    this.retry = { operation: "cohere.embed", logger: config.logger, ...config.retry };
    this.breaker = createCircuitBreaker(
      "cohere-embeddings",
      async (batch: string[]) => {
        try {
          // Queries and clauses share one input type so both land in the same space.
          return await this.client.v2.embed({
            texts: batch,
            model: this.model,
            inputType: "search_document",
            embeddingTypes: ["float"],
          });
        } catch (error: unknown) {
          throw toEmbeddingError(error, this.name);
        }
      },
      { timeout: config.timeoutMs ?? 60_000, errorFilter: isCredentialFailure, logger: config.logger },
    );
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (const batch of toBatches(texts, BATCH_SIZE)) {
      const response = await this.embedBatch(batch);

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw toEmbeddingError(
          new Error(`expected ${batch.length} embeddings, received ${vectors.length}`),
          this.name,
        );
      }
      allEmbeddings.push(...vectors);

      // Use actual tokensUsed from Cohere response for billing accuracy
      totalTokens += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    this.logger?.debug({ model: this.model, texts: texts.length, tokensUsed: totalTokens }, "embedded");

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: allEmbeddings[0]?.length ?? 0,
    };
  }

  private async embedBatch(batch: string[]): Promise<CohereEmbedResponse> {
    try {
      return await withRetry(() => this.breaker.fire(batch), this.retry);
    } catch (error: unknown) {
      throw toEmbeddingError(error, this.name);
    }
  }
}
