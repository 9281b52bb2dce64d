import type { ToolCall, ToolInvocation, ToolSpec } from "@contract-qa/types";
import { ToolComputationError } from "@contract-qa/errors";
import type { Logger } from "@contract-qa/logger";
import { isToolError } from "./tool.js";
import type { ToolDefinition, ToolOutput } from "./tool.js";

export interface ToolExecutor {
  list(): string[];
  specs(): ToolSpec[];
  /**
   * Runs one model-requested call. Failures are reported in the returned
   * invocation (`ok: false`) so the conversation can continue.
   */
  execute(call: ToolCall): ToolInvocation;
}

function parseArguments(call: ToolCall): unknown {
  if (call.arguments.trim() === "") return {};
  try {
    return JSON.parse(call.arguments);
  } catch (error: unknown) {
    throw new ToolComputationError(`Arguments are not valid JSON: ${call.arguments}`, call.name, {
      cause: error,
    });
  }
}

function formatOutput(output: ToolOutput): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}

export function createToolExecutor(
  tools: readonly ToolDefinition[],
  logger: Logger,
): ToolExecutor {
  const index = new Map<string, ToolDefinition>();

  for (const tool of tools) {
    if (index.has(tool.name)) {
      logger.warn({ tool: tool.name }, "duplicate tool name, keeping first");
      continue;
    }
    index.set(tool.name, tool);
  }

  return {
    list(): string[] {
      return [...index.keys()];
    },

    specs(): ToolSpec[] {
      return [...index.values()].map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      }));
    },

    execute(call: ToolCall): ToolInvocation {
      let args: unknown = call.arguments;
      try {
        args = parseArguments(call);
        const tool = index.get(call.name);
        if (!tool) {
          throw new ToolComputationError(`Unknown tool: ${call.name}`, call.name);
        }

        const output = tool.run(args);
        const ok = !isToolError(output);
        logger.info({ tool: call.name, ok }, "tool executed");
        return { id: call.id, name: call.name, arguments: args, ok, output: formatOutput(output) };
      } catch (error: unknown) {
        if (!(error instanceof ToolComputationError)) throw error;
        logger.warn({ tool: call.name, err: error }, "tool could not compute");
        return {
          id: call.id,
          name: call.name,
          arguments: args,
          ok: false,
          output: `Could not compute ${call.name}: ${error.message}`,
        };
      }
    },
  };
}
