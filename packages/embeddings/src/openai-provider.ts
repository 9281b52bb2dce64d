import OpenAI from "openai";
import type CircuitBreaker from "opossum";
import type { EmbeddingResult } from "@contract-qa/types";
import { createCircuitBreaker, withRetry } from "@contract-qa/errors";
import type { RetryOptions } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import {
  isCredentialFailure,
  mapConcurrent,
  toBatches,
  toEmbeddingError,
} from "./batching.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const BATCH_SIZE = 256;
const MAX_CONCURRENT_BATCHES = 4;

interface EmbeddingsResponse {
  data: Array<{ index: number; embedding: number[] }>;
  usage?: { total_tokens: number };
}

/** The slice of the OpenAI SDK this provider calls. */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<EmbeddingsResponse>;
  };
}

export interface OpenAIProviderConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
  logger?: Logger;
  client?: OpenAIEmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  private client: OpenAIEmbeddingsClient;
  private breaker: CircuitBreaker<[string[]], EmbeddingsResponse>;
  private retry: RetryOptions;
  private logger: Logger | undefined;

  constructor(config: OpenAIProviderConfig) {
    this.client =
      config.client ??
      new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.logger = config.logger;
    this.retry = { operation: "openai.embeddings", logger: config.logger, ...config.retry };
    this.breaker = createCircuitBreaker(
      "openai-embeddings",
      async (batch: string[]) => {
        try {
          return await this.client.embeddings.create({ model: this.model, input: batch });
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
    const batches = toBatches(texts, BATCH_SIZE);
    const responses = await mapConcurrent(batches, MAX_CONCURRENT_BATCHES, (batch) =>
      this.embedBatch(batch),
    );

    const embeddings: number[][] = [];
    let tokensUsed = 0;
    for (const response of responses) {
      // The API documents `index`; ordering of `data` is not guaranteed.
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      embeddings.push(...ordered.map((item) => item.embedding));
      tokensUsed += response.usage?.total_tokens ?? 0;
    }

    if (embeddings.length !== texts.length) {
      throw toEmbeddingError(
        new Error(`expected ${texts.length} embeddings, received ${embeddings.length}`),
        this.name,
      );
    }

    this.logger?.debug({ model: this.model, texts: texts.length, batches: batches.length, tokensUsed }, "embedded");

    return {
      embeddings,
      model: this.model,
      tokensUsed,
      dimensions: embeddings[0]?.length ?? 0,
    };
  }

  private async embedBatch(batch: string[]): Promise<EmbeddingsResponse> {
    try {
      return await withRetry(() => this.breaker.fire(batch), this.retry);
    } catch (error: unknown) {
      throw toEmbeddingError(error, this.name);
    }
  }
}
