import type { AppConfig } from "@contract-qa/types";
import { createChunker } from "@contract-qa/chunker";
import { ContractSession, IndexCache } from "@contract-qa/core";
import { createEmbeddingProvider } from "@contract-qa/embeddings";
import type { IEmbeddingProvider } from "@contract-qa/embeddings";
import { OpenAIChatModel } from "@contract-qa/llm";
import type { IChatModel } from "@contract-qa/llm";
import { createLogger } from "@contract-qa/logger";
import type { Logger } from "@contract-qa/logger";
import { DEFAULT_TOOLS, createToolExecutor } from "@contract-qa/tools";

export interface Container {
  config: AppConfig;
  logger: Logger;
  cache: IndexCache;
  embeddingProvider: IEmbeddingProvider;
  chatModel: IChatModel;
  createSession(): ContractSession;
}

export interface ContainerOverrides {
  embeddingProvider?: IEmbeddingProvider;
  chatModel?: IChatModel;
  logger?: Logger;
}

export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const logger = overrides.logger ?? createLogger({ service: "contract-qa", level: config.logLevel });
  const timeoutMs = config.network.requestTimeoutMs;
  const embeddingLogger = logger.child({ component: "embeddings" });

  const embeddingProvider =
    overrides.embeddingProvider ??
    createEmbeddingProvider({
      provider: config.embedding.provider,
      openai: {
        apiKey: config.openai.apiKey,
        baseUrl: config.openai.baseUrl,
        model: config.openai.embedModel,
        timeoutMs,
        logger: embeddingLogger,
      },
      cohere: {
        apiKey: config.cohere.apiKey,
        model: config.cohere.embedModel,
        timeoutMs,
        logger: embeddingLogger,
      },
    });

  const chatModel =
    overrides.chatModel ??
    new OpenAIChatModel({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.chatModel,
      temperature: config.openai.temperature,
      timeoutMs,
      logger: logger.child({ component: "llm" }),
    });

  const cache = new IndexCache({
    maxEntries: config.cache.maxEntries,
    logger: logger.child({ component: "index-cache" }),
  });
  const tools = createToolExecutor(DEFAULT_TOOLS, logger.child({ component: "tools" }));
  const chunker = createChunker(config.chunking.strategy);

  return {
    config,
    logger,
    cache,
    embeddingProvider,
    chatModel,
    createSession: () =>
      new ContractSession({
        cache,
        chunker,
        chunking: config.chunking,
        embeddingProvider,
        chatModel,
        tools,
        topK: config.retrieval.topK,
        maxToolRounds: config.composer.maxToolRounds,
        maxSchemaRetries: config.composer.maxSchemaRetries,
        logger: logger.child({ component: "session" }),
      }),
  };
}
