import { describe, it, expect } from "vitest";
import type { ChatRequest, ChunkingConfig } from "@contract-qa/types";
import { RecursiveChunker } from "@contract-qa/chunker";
import { EmbeddingError } from "@contract-qa/errors";
import { createLogger } from "@contract-qa/logger";
import { DEFAULT_TOOLS, createToolExecutor } from "@contract-qa/tools";
import { ContractSession } from "./session.js";
import type { SessionDependencies } from "./session.js";
import { IndexCache } from "./index-cache.js";
import {
  FakeEmbeddingProvider,
  LEASE_TEXT,
  ScriptedChatModel,
  clauseContaining,
  message,
  textDocument,
} from "./test-fakes.js";
import type { ScriptStep } from "./test-fakes.js";

const logger = createLogger({ level: "silent" });
const chunking: ChunkingConfig = { strategy: "recursive", chunkSize: 200, overlap: 20 };

const RENT_CLAUSE = "Tenant shall pay monthly rent of $2,500.00 to Landlord.";
const DUE_CLAUSE = "Rent is due on the first day of each month.";

function setup(steps: ScriptStep[], overrides: Partial<SessionDependencies> = {}) {
  const embeddingProvider = new FakeEmbeddingProvider();
  const chatModel = new ScriptedChatModel(steps);
  const deps: SessionDependencies = {
    cache: new IndexCache({ maxEntries: 4, logger }),
    chunker: new RecursiveChunker(),
    chunking,
    embeddingProvider,
    chatModel,
    tools: createToolExecutor(DEFAULT_TOOLS, logger),
    topK: 5,
    maxToolRounds: 4,
    maxSchemaRetries: 2,
    logger,
    ...overrides,
  };
  return { session: new ContractSession(deps), embeddingProvider, chatModel, deps };
}

function rentAnswer(request: ChatRequest) {
  return message({
    summary: "Monthly rent is $2,500.00, due on the first day of each month.",
    obligations: ["Pay monthly rent of $2,500.00 to the Landlord on the first day of each month."],
    risks: ["A late fee of $150.00 applies if rent is more than 5 days late."],
    supporting_clauses: [
      { id: clauseContaining(request, RENT_CLAUSE), text: RENT_CLAUSE },
      { id: clauseContaining(request, DUE_CLAUSE), text: DUE_CLAUSE },
    ],
  });
}

describe("ContractSession", () => {
  it("answers the rent question with grounded clauses", async () => {
    const { session, chatModel } = setup([
      {
        kind: "tool_calls",
        content: null,
        calls: [{ id: "call_1", name: "extract_monetary_values", arguments: JSON.stringify({ text: RENT_CLAUSE }) }],
      },
      rentAnswer,
    ]);
    await session.open(textDocument(LEASE_TEXT, "lease.txt"));

    const outcome = await session.ask("When is the rent due and how much is it?");

    expect(outcome.status).toBe("answered");
    if (outcome.status !== "answered") return;
    expect(outcome.answer.obligations[0]).toContain("Pay monthly rent of $2,500.00");
    expect(outcome.answer.supportingClauses.map((c) => c.text)).toEqual([RENT_CLAUSE, DUE_CLAUSE]);
    expect(outcome.toolInvocations.map((t) => t.output)).toEqual(['["$2,500.00"]']);
    expect(outcome.attempts).toBe(2);

    const context = outcome.retrieval.chunks.map((c) => c.chunk.content).join("\n\n");
    for (const clause of outcome.answer.supportingClauses) {
      expect(context).toContain(clause.text);
    }

    const rentRank = outcome.retrieval.chunks.find((c) => c.chunk.id === "chunk-2")?.rank;
    expect(outcome.evidence).toBe(
      `**Clause ${String(rentRank)}**: *${RENT_CLAUSE}*\n**Clause ${String(rentRank)}**: *${DUE_CLAUSE}*`,
    );
    expect(outcome.rendered).toBe(
      "### Summary\nMonthly rent is $2,500.00, due on the first day of each month.\n\n" +
        "### Obligations\n- Pay monthly rent of $2,500.00 to the Landlord on the first day of each month.\n\n" +
        "### Risks & Penalties\n- A late fee of $150.00 applies if rent is more than 5 days late.",
    );
    expect(session.history).toEqual([
      { role: "user", content: "When is the rent due and how much is it?" },
      { role: "assistant", content: outcome.rendered },
    ]);
    expect(chatModel.requests).toHaveLength(2);
  });

  it("embeds a document only once when it is opened again", async () => {
    const { session, embeddingProvider, deps } = setup([]);

    const first = await session.open(textDocument(LEASE_TEXT));
    const second = await session.open(textDocument(LEASE_TEXT));
    const other = new ContractSession(deps);
    const third = await other.open(textDocument(LEASE_TEXT, "copy.txt"));

    expect([first.cached, second.cached, third.cached]).toEqual([false, true, true]);
    expect(third.name).toBe("copy.txt");
    expect(first.chunkCount).toBe(4);
    expect(embeddingProvider.calls).toHaveLength(1);
  });

  it("re-indexes when the chunking parameters change", async () => {
    const { embeddingProvider, deps } = setup([]);
    const a = new ContractSession(deps);
    const b = new ContractSession({ ...deps, chunking: { ...chunking, chunkSize: 300 } });

    const first = await a.open(textDocument(LEASE_TEXT));
    const second = await b.open(textDocument(LEASE_TEXT));

    expect(second.cached).toBe(false);
    expect(second.documentKey).not.toBe(first.documentKey);
    expect(embeddingProvider.calls).toHaveLength(2);
  });

  it("refuses questions before a document is open", async () => {
    const { session } = setup([]);

    const outcome = await session.ask("What is the rent?");

    expect(outcome).toMatchObject({
      status: "failed",
      error: { code: "VALIDATION_ERROR", message: "Open a document before asking questions" },
    });
    expect(session.history).toEqual([]);
  });

  it("propagates build failures from open and caches nothing", async () => {
    const { session, embeddingProvider, deps } = setup([]);
    embeddingProvider.failWith = new EmbeddingError("fake rejected the API key", "fake", { statusCode: 401 });

    await expect(session.open(textDocument(LEASE_TEXT))).rejects.toMatchObject({ statusCode: 401 });
    expect(deps.cache.size).toBe(0);
    expect(session.document).toBeUndefined();
  });

  it("isolates a failed query from the index and earlier history", async () => {
    const { session } = setup([
      rentAnswer,
      message("not json"),
      message("not json"),
      message("not json"),
    ]);
    await session.open(textDocument(LEASE_TEXT));
    const answered = await session.ask("What is the rent?");

    const failed = await session.ask("What about pets?");

    expect(answered.status).toBe("answered");
    expect(failed).toMatchObject({ status: "failed", error: { name: "SchemaViolationError" } });
    expect(session.history.map((h) => h.role)).toEqual(["user", "assistant", "user"]);
    expect(session.document?.chunkCount).toBe(4);
  });

  it("reports an unavailable embedding backend as a failed query", async () => {
    const { session, embeddingProvider } = setup([]);
    await session.open(textDocument(LEASE_TEXT));
    embeddingProvider.failWith = new EmbeddingError("fake embeddings unavailable: timeout", "fake");

    const outcome = await session.ask("What is the rent?");

    expect(outcome).toMatchObject({ status: "failed", error: { name: "EmbeddingError", statusCode: 503 } });
  });

  it("starts a fresh history when a different document is opened", async () => {
    const { session } = setup([rentAnswer]);
    await session.open(textDocument(LEASE_TEXT));
    await session.ask("What is the rent?");

    await session.open(textDocument(`${LEASE_TEXT}\n\n7. Pets. No pets are allowed.`));

    expect(session.history).toEqual([]);
  });

  it("returns a copy of the history", async () => {
    const { session } = setup([]);
    await session.open(textDocument(LEASE_TEXT));
    await session.ask("   ");

    const history = session.history;
    expect(history).toEqual([{ role: "user", content: "   " }]);
    session.clearHistory();
    expect(history).toHaveLength(1);
    expect(session.history).toEqual([]);
  });

  it("keeps the cached index intact when returned chunks are edited", async () => {
    const noTerms = message({ summary: "No such terms.", obligations: [], risks: [], supporting_clauses: [] });
    const { session, chatModel } = setup([noTerms, noTerms]);
    await session.open(textDocument(LEASE_TEXT));

    const first = await session.ask("Is subletting allowed?");
    if (first.status !== "answered") throw new Error("expected an answer");
    for (const retrieved of first.retrieval.chunks) {
      retrieved.chunk.content = "rewritten";
    }
    await session.ask("Is subletting allowed?");

    const [firstRequest, secondRequest] = chatModel.requests;
    expect(secondRequest?.messages[1]).toEqual(firstRequest?.messages[1]);
    expect(secondRequest?.messages[1]?.content).not.toContain("rewritten");
  });
});
