import type { z } from "zod";
import { ToolComputationError } from "@contract-qa/errors";

export type ToolOutput = string | string[];

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema of the arguments object, as shown to the model. */
  parameters: Record<string, unknown>;
  /** Validates `args` and runs the tool. Throws ToolComputationError on bad arguments. */
  run(args: unknown): ToolOutput;
}

export interface ToolConfig<TArgs> {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  schema: z.ZodType<TArgs>;
  compute(args: TArgs): ToolOutput;
}

export function defineTool<TArgs>(config: ToolConfig<TArgs>): ToolDefinition {
  return {
    name: config.name,
    description: config.description,
    parameters: config.parameters,
    run(args: unknown): ToolOutput {
      const parsed = config.schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`,
        );
        throw new ToolComputationError(`Invalid arguments: ${issues.join("; ")}`, config.name, {
          details: { issues },
        });
      }
      return config.compute(parsed.data);
    },
  };
}

/** True for the designated error values tools return instead of throwing. */
export function isToolError(output: ToolOutput): boolean {
  return typeof output === "string" && output.startsWith("Error: ");
}
