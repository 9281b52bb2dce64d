export { calculateDeadline, parseIsoDate, formatIsoDate, DEADLINE_FORMAT_ERROR } from "./deadline.js";
export { extractMonetaryValues } from "./monetary.js";
export { defineTool, isToolError } from "./tool.js";
export type { ToolDefinition, ToolConfig, ToolOutput } from "./tool.js";
export { calculateDeadlineTool, extractMonetaryValuesTool, DEFAULT_TOOLS } from "./builtins.js";
export { createToolExecutor } from "./tool-executor.js";
export type { ToolExecutor } from "./tool-executor.js";
