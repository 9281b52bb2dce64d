import { z } from "zod";
import { calculateDeadline } from "./deadline.js";
import { extractMonetaryValues } from "./monetary.js";
import { defineTool } from "./tool.js";
import type { ToolDefinition } from "./tool.js";

export const calculateDeadlineTool = defineTool({
  name: "calculate_deadline",
  description:
    "Calculates a deadline date given a start date (YYYY-MM-DD) and a number of calendar days. Negative days count backwards.",
  parameters: {
    type: "object",
    properties: {
      start_date_str: { type: "string", description: "Start date in YYYY-MM-DD format" },
      days: { type: "integer", description: "Number of calendar days to add" },
    },
    required: ["start_date_str", "days"],
    additionalProperties: false,
  },
  schema: z.object({
    start_date_str: z.string(),
    days: z.number().int(),
  }),
  compute: (args) => calculateDeadline(args.start_date_str, args.days),
});

export const extractMonetaryValuesTool = defineTool({
  name: "extract_monetary_values",
  description:
    "Extracts monetary amounts ($, USD, €, EUR, £) from text, returning each currency marker with its amount.",
  parameters: {
    type: "object",
    properties: {
      text: { type: "string", description: "Text to scan for monetary amounts" },
    },
    required: ["text"],
    additionalProperties: false,
  },
  schema: z.object({ text: z.string() }),
  compute: (args) => extractMonetaryValues(args.text),
});

export const DEFAULT_TOOLS: readonly ToolDefinition[] = [
  calculateDeadlineTool,
  extractMonetaryValuesTool,
];
