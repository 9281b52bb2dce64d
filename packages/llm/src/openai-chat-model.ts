import OpenAI from "openai";
import type CircuitBreaker from "opossum";
import type { ChatMessage, ChatRequest, ChatTurn, ToolSpec } from "@contract-qa/types";
import {
  AppError,
  ExternalServiceError,
  RateLimitedError,
  UnauthorizedError,
  createCircuitBreaker,
  withRetry,
} from "@contract-qa/errors";
import type { RetryOptions } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import type { IChatModel } from "./chat-model.interface.js";

type CompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type MessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ToolParam = OpenAI.Chat.Completions.ChatCompletionTool;

interface CompletionMessage {
  content: string | null;
  refusal?: string | null;
  tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
}

interface Completion {
  choices: Array<{ message: CompletionMessage }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

/** The slice of the OpenAI SDK this model calls. */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: CompletionParams): Promise<Completion>;
    };
  };
}

export interface OpenAIChatModelConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  retry?: RetryOptions;
  client?: OpenAIChatClient;
  logger?: Logger;
}

const DEFAULT_MODEL = "gpt-4o";

export function toOpenAiMessages(messages: ChatMessage[]): MessageParam[] {
  return messages.map((msg): MessageParam => {
    switch (msg.role) {
      case "system":
        return { role: "system", content: msg.content };
      case "user":
        return { role: "user", content: msg.content };
      case "assistant":
        return { role: "assistant", content: msg.content };
      case "assistant_tool_calls":
        return {
          role: "assistant",
          content: msg.content,
          tool_calls: msg.calls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      case "tool":
        return { role: "tool", tool_call_id: msg.toolCallId, content: msg.content };
    }
  });
}

function toOpenAiTool(tool: ToolSpec): ToolParam {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

function retryAfterSeconds(error: unknown): number {
  if (typeof error !== "object" || error === null || !("headers" in error)) return 0;
  const headers = error.headers;
  if (typeof headers !== "object" || headers === null || !("retry-after" in headers)) return 0;
  const value = Number(headers["retry-after"]);
  return Number.isFinite(value) ? value : 0;
}

export function toChatError(error: unknown): AppError {
  if (AppError.isAppError(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);
  if (status === 401 || status === 403) {
    return new UnauthorizedError(`OpenAI rejected the API key: ${message}`, { cause: error });
  }
  if (status === 429) {
    return new RateLimitedError(`OpenAI rate limit reached: ${message}`, retryAfterSeconds(error), {
      cause: error,
    });
  }
  return new ExternalServiceError(`OpenAI chat completion failed: ${message}`, "openai", {
    details: status === undefined ? undefined : { status },
    cause: error,
  });
}

function isClientError(error: unknown): boolean {
  return AppError.isAppError(error) && error.statusCode >= 400 && error.statusCode < 500;
}

/**
 * Chat completions with native tool calling and, when a response schema is
 * given, strict JSON-schema structured output.
 */
export class OpenAIChatModel implements IChatModel {
  readonly name = "openai";
  readonly model: string;
  private client: OpenAIChatClient;
  private temperature: number;
  private retry: RetryOptions;
  private logger: Logger | undefined;
  private breaker: CircuitBreaker<[CompletionParams], Completion>;

  constructor(config: OpenAIChatModelConfig) {
    this.client =
      config.client ??
      new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0;
    this.logger = config.logger;
    this.retry = { operation: "openai.chat", logger: config.logger, ...config.retry };
    this.breaker = createCircuitBreaker(
      "openai-chat",
      async (params: CompletionParams) => {
        try {
          return await this.client.chat.completions.create(params);
        } catch (error: unknown) {
          throw toChatError(error);
        }
      },
      { timeout: config.timeoutMs ?? 60_000, errorFilter: isClientError, logger: config.logger },
    );
  }

  async complete(request: ChatRequest): Promise<ChatTurn> {
    const params: CompletionParams = {
      model: this.model,
      temperature: this.temperature,
      messages: toOpenAiMessages(request.messages),
    };
    if (request.tools.length > 0) {
      params.tools = request.tools.map(toOpenAiTool);
      params.tool_choice = "auto";
    }
    if (request.responseSchema) {
      params.response_format = {
        type: "json_schema",
        json_schema: {
          name: request.responseSchema.name,
          schema: request.responseSchema.schema,
          strict: true,
        },
      };
    }

    const startTime = Date.now();
    let completion: Completion;
    try {
      completion = await withRetry(() => this.breaker.fire(params), this.retry);
    } catch (error: unknown) {
      throw toChatError(error);
    }

    this.logger?.debug(
      {
        model: this.model,
        latencyMs: Date.now() - startTime,
        promptTokens: completion.usage?.prompt_tokens,
        completionTokens: completion.usage?.completion_tokens,
      },
      "chat completion",
    );

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new ExternalServiceError("Empty response from OpenAI", "openai");
    }

    const calls = (message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));
    if (calls.length > 0) {
      return { kind: "tool_calls", content: message.content, calls };
    }

    // A refusal is surfaced as the message so the caller's validation rejects it.
    return { kind: "message", content: message.content ?? message.refusal ?? "" };
  }
}
