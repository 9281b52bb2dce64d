export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON argument string as produced by the model. */
  arguments: string;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string }
  | { role: "assistant_tool_calls"; content: string | null; calls: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export interface ToolSpec {
  name: string;
  description: string;
  /** JSON schema of the arguments object. */
  parameters: Record<string, unknown>;
}

export interface ResponseSchema {
  name: string;
  /** JSON schema the final message must satisfy. */
  schema: Record<string, unknown>;
}

export interface ChatRequest {
  messages: ChatMessage[];
  tools: ToolSpec[];
  responseSchema?: ResponseSchema;
}

export type ChatTurn =
  | { kind: "tool_calls"; content: string | null; calls: ToolCall[] }
  | { kind: "message"; content: string };
