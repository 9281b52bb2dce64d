import type {
  ChatMessage,
  ComposedAnswer,
  RetrievedChunk,
  ToolInvocation,
} from "@contract-qa/types";
import type { IChatModel } from "@contract-qa/llm";
import type { ToolExecutor } from "@contract-qa/tools";
import { SchemaViolationError } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import { assembleContext } from "./context-assembler.js";
import { LEGAL_RESPONSE_SCHEMA, parseLegalResponse } from "./answer-schema.js";
import { groundingIssues } from "./grounding.js";

export const SYSTEM_PROMPT = [
  "You are an expert legal analysis assistant reviewing a contract.",
  "Answer STRICTLY based on the provided clauses. If they do not answer the question, say so in the summary and leave obligations and risks empty.",
  "Identify obligations, risks and penalties, and financial terms.",
  "If dates are relative, use the calculate_deadline tool to compute them. Use extract_monetary_values to collect currency amounts.",
  'Every supporting_clauses entry must use the clause label (for example "Clause 2") as its id and copy its text verbatim from that clause.',
].join("\n");

export interface ComposerDependencies {
  chatModel: IChatModel;
  tools: ToolExecutor;
  /** Tool-call rounds allowed before tools are withheld. */
  maxToolRounds: number;
  /** Corrective re-prompts after an invalid answer before giving up. */
  maxSchemaRetries: number;
  logger: Logger;
}

export function buildUserMessage(context: string, query: string): string {
  return `Context:\n${context}\n\nUser Query: ${query}`;
}

function correctiveFeedback(issues: string[]): string {
  return [
    "Your previous response was rejected:",
    ...issues.map((issue) => `- ${issue}`),
    "Reply again with only the JSON object, following the schema exactly and quoting clause text verbatim.",
  ].join("\n");
}

/**
 * Runs the bounded tool loop and returns a schema-valid answer whose cited
 * clauses all come from `chunks`. The model is called at most
 * `maxToolRounds + maxSchemaRetries + 1` times.
 */
export async function composeAnswer(
  query: string,
  chunks: readonly RetrievedChunk[],
  deps: ComposerDependencies,
): Promise<ComposedAnswer> {
  const { logger } = deps;
  const startTime = Date.now();
  const context = assembleContext(chunks);
  const messages: ChatMessage[] = [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: buildUserMessage(context, query) },
  ];
  const toolInvocations: ToolInvocation[] = [];
  const toolSpecs = deps.tools.specs();

  let toolRounds = 0;
  let schemaRetries = 0;
  let attempts = 0;

  for (;;) {
    const toolsAllowed = toolRounds < deps.maxToolRounds;
    attempts++;
    const turn = await deps.chatModel.complete({
      messages,
      tools: toolsAllowed ? toolSpecs : [],
      responseSchema: LEGAL_RESPONSE_SCHEMA,
    });

    let issues: string[];
    let content: string;
    if (turn.kind === "tool_calls") {
      if (toolsAllowed) {
        toolRounds++;
        messages.push({ role: "assistant_tool_calls", content: turn.content, calls: turn.calls });
        for (const call of turn.calls) {
          const invocation = deps.tools.execute(call);
          toolInvocations.push(invocation);
          messages.push({ role: "tool", toolCallId: call.id, content: invocation.output });
        }
        logger.debug({ round: toolRounds, calls: turn.calls.length }, "tool round completed");
        continue;
      }
      content = turn.content ?? "";
      issues = ["Tools are no longer available; answer with the final JSON object now."];
    } else {
      content = turn.content;
      const parsed = parseLegalResponse(content);
      if (parsed.ok) {
        issues = groundingIssues(parsed.answer, chunks);
        if (issues.length === 0) {
          logger.info(
            {
              attempts,
              toolRounds,
              toolCalls: toolInvocations.length,
              clauses: parsed.answer.supportingClauses.length,
              durationMs: Date.now() - startTime,
            },
            "answer composed",
          );
          return { answer: parsed.answer, toolInvocations, context, attempts };
        }
      } else {
        issues = parsed.issues;
      }
    }

    logger.warn({ attempt: attempts, issues }, "answer rejected");
    if (schemaRetries >= deps.maxSchemaRetries) {
      throw new SchemaViolationError(
        `The model did not produce a valid, grounded answer after ${String(attempts)} attempts`,
        issues,
      );
    }
    schemaRetries++;
    messages.push({ role: "assistant", content });
    messages.push({ role: "user", content: correctiveFeedback(issues) });
  }
}
