import type { ChatRequest, ChatTurn, DocumentInput, EmbeddingResult } from "@contract-qa/types";
import type { IEmbeddingProvider } from "@contract-qa/embeddings";
import type { IChatModel } from "@contract-qa/llm";

const DIMENSIONS = 64;

function hashToken(token: string): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % DIMENSIONS;
}

/** Bag-of-words vectors: texts sharing words point in similar directions. */
export function bagOfWords(text: string): number[] {
  const vector = new Array<number>(DIMENSIONS).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9$]+/g) ?? []) {
    const slot = hashToken(token);
    vector[slot] = (vector[slot] ?? 0) + 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model: string;
  /** Every batch passed to batchEmbed, in call order. */
  readonly calls: string[][] = [];
  failWith: Error | undefined;

  constructor(model = "fake-embed-1") {
    this.model = model;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push([...texts]);
    if (this.failWith) throw this.failWith;
    return {
      embeddings: texts.map(bagOfWords),
      model: this.model,
      tokensUsed: texts.length,
      dimensions: DIMENSIONS,
    };
  }
}

export type ScriptStep = ChatTurn | Error | ((request: ChatRequest) => ChatTurn);

/** Replays scripted turns and records a copy of every request it receives. */
export class ScriptedChatModel implements IChatModel {
  readonly name = "scripted";
  readonly model = "scripted-1";
  readonly requests: ChatRequest[] = [];
  private steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  async complete(request: ChatRequest): Promise<ChatTurn> {
    this.requests.push(structuredClone(request));
    const step = this.steps.shift();
    if (step === undefined) throw new Error("ScriptedChatModel ran out of turns");
    if (step instanceof Error) throw step;
    return typeof step === "function" ? step(request) : step;
  }
}

export function message(content: unknown): ChatTurn {
  return { kind: "message", content: typeof content === "string" ? content : JSON.stringify(content) };
}

export function textDocument(text: string, name = "contract.txt"): DocumentInput {
  return { bytes: new TextEncoder().encode(text), mimeType: "text/plain", name };
}

/** Short lease; at chunkSize 200 / overlap 20 it splits into four chunks. */
export const LEASE_TEXT = [
  "RESIDENTIAL LEASE AGREEMENT between Harbor Properties LLC and Jordan Lee.",
  "1. Term. The lease begins on 2024-01-01 and runs for twelve months.",
  "2. Rent. Tenant shall pay monthly rent of $2,500.00 to Landlord.",
  "3. Due Date. Rent is due on the first day of each month.",
  "4. Late Fee. A late fee of $150.00 applies if rent is more than 5 days late.",
  "5. Deposit. Tenant shall pay a security deposit of $5,000.00 before move-in.",
  "6. Termination. Either party may terminate with 60 days written notice.",
].join("\n\n");

/** Label of the context clause that contains `text`, as the model would cite it. */
export function clauseContaining(request: ChatRequest, text: string): string {
  const user = request.messages.find((m) => m.role === "user");
  const context = user?.content ?? "";
  const at = context.indexOf(text);
  let label = "unknown";
  for (const match of context.matchAll(/\[(Clause \d+)\]: /g)) {
    if (match.index !== undefined && match.index < at) label = match[1] ?? label;
  }
  return label;
}
