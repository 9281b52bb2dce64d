export interface ClauseReference {
  id: string;
  text: string;
}

export interface LegalResponse {
  summary: string;
  obligations: string[];
  risks: string[];
  supportingClauses: ClauseReference[];
}

export interface ToolInvocation {
  id: string;
  name: string;
  arguments: unknown;
  ok: boolean;
  output: string;
}

export interface ComposedAnswer {
  answer: LegalResponse;
  toolInvocations: ToolInvocation[];
  /** The exact context block the model was given. */
  context: string;
  /** Number of model calls it took to reach the answer. */
  attempts: number;
}

export type HistoryRole = "user" | "assistant";

export interface HistoryEntry {
  role: HistoryRole;
  content: string;
}
