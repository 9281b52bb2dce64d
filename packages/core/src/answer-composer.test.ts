import { describe, it, expect } from "vitest";
import type { RetrievedChunk } from "@contract-qa/types";
import { SchemaViolationError } from "@contract-qa/errors";
import { createLogger } from "@contract-qa/logger";
import { DEADLINE_FORMAT_ERROR, DEFAULT_TOOLS, createToolExecutor } from "@contract-qa/tools";
import { composeAnswer, SYSTEM_PROMPT } from "./answer-composer.js";
import { ScriptedChatModel, message } from "./test-fakes.js";

const logger = createLogger({ level: "silent" });
const tools = createToolExecutor(DEFAULT_TOOLS, logger);

const CLAUSES = [
  "2. Rent. Tenant shall pay monthly rent of $2,500.00 to Landlord.",
  "3. Due Date. Rent is due on the first day of each month.",
];

const CHUNKS: RetrievedChunk[] = CLAUSES.map((content, i) => ({
  rank: i + 1,
  score: 0.9 - i / 10,
  chunk: { id: `chunk-${i + 1}`, index: i, content, startChar: 0, endChar: content.length },
}));

const GROUNDED = {
  summary: "Monthly rent is $2,500.00.",
  obligations: ["Pay $2,500.00 each month."],
  risks: [],
  supporting_clauses: [{ id: "Clause 1", text: "Tenant shall pay monthly rent of $2,500.00" }],
};

function compose(model: ScriptedChatModel, limits = { maxToolRounds: 2, maxSchemaRetries: 2 }) {
  return composeAnswer("How much is the rent?", CHUNKS, {
    chatModel: model,
    tools,
    logger,
    ...limits,
  });
}

describe("composeAnswer", () => {
  it("sends the system directive and the labelled context", async () => {
    const model = new ScriptedChatModel([message(GROUNDED)]);

    const result = await compose(model);

    expect(result.context).toBe(
      "[Clause 1]: 2. Rent. Tenant shall pay monthly rent of $2,500.00 to Landlord.\n\n" +
        "[Clause 2]: 3. Due Date. Rent is due on the first day of each month.",
    );
    expect(model.requests[0]?.messages).toEqual([
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: `Context:\n${result.context}\n\nUser Query: How much is the rent?` },
    ]);
    expect(model.requests[0]?.tools.map((t) => t.name)).toEqual([
      "calculate_deadline",
      "extract_monetary_values",
    ]);
    expect(model.requests[0]?.responseSchema?.name).toBe("legal_response");
    expect(result.attempts).toBe(1);
    expect(result.answer.supportingClauses).toEqual(GROUNDED.supporting_clauses);
  });

  it("runs requested tools and feeds their results back", async () => {
    const model = new ScriptedChatModel([
      {
        kind: "tool_calls",
        content: null,
        calls: [
          { id: "call_1", name: "extract_monetary_values", arguments: JSON.stringify({ text: CLAUSES[0] }) },
          { id: "call_2", name: "calculate_deadline", arguments: '{"start_date_str":"2024-01-01","days":30}' },
        ],
      },
      message(GROUNDED),
    ]);

    const result = await compose(model);

    expect(result.toolInvocations.map((t) => [t.name, t.ok, t.output])).toEqual([
      ["extract_monetary_values", true, '["$2,500.00"]'],
      ["calculate_deadline", true, "2024-01-31"],
    ]);
    expect(model.requests[1]?.messages.slice(2)).toEqual([
      {
        role: "assistant_tool_calls",
        content: null,
        calls: [
          { id: "call_1", name: "extract_monetary_values", arguments: JSON.stringify({ text: CLAUSES[0] }) },
          { id: "call_2", name: "calculate_deadline", arguments: '{"start_date_str":"2024-01-01","days":30}' },
        ],
      },
      { role: "tool", toolCallId: "call_1", content: '["$2,500.00"]' },
      { role: "tool", toolCallId: "call_2", content: "2024-01-31" },
    ]);
    expect(result.attempts).toBe(2);
  });

  it("reports a tool error inline and keeps going", async () => {
    const model = new ScriptedChatModel([
      {
        kind: "tool_calls",
        content: null,
        calls: [{ id: "c1", name: "calculate_deadline", arguments: '{"start_date_str":"2024-13-01","days":5}' }],
      },
      message(GROUNDED),
    ]);

    const result = await compose(model);

    expect(result.toolInvocations[0]).toMatchObject({ ok: false, output: DEADLINE_FORMAT_ERROR });
    expect(result.answer.summary).toBe("Monthly rent is $2,500.00.");
  });

  it("withholds tools after the round limit", async () => {
    const toolTurn = {
      kind: "tool_calls" as const,
      content: null,
      calls: [{ id: "c", name: "extract_monetary_values", arguments: '{"text":"$1"}' }],
    };
    const model = new ScriptedChatModel([toolTurn, toolTurn, message(GROUNDED)]);

    const result = await compose(model, { maxToolRounds: 1, maxSchemaRetries: 2 });

    expect(model.requests.map((r) => r.tools.length)).toEqual([2, 0, 0]);
    expect(result.toolInvocations).toHaveLength(1);
    expect(model.requests[2]?.messages.at(-1)).toEqual({
      role: "user",
      content:
        "Your previous response was rejected:\n" +
        "- Tools are no longer available; answer with the final JSON object now.\n" +
        "Reply again with only the JSON object, following the schema exactly and quoting clause text verbatim.",
    });
    expect(result.attempts).toBe(3);
  });

  it("sends schema violations back as corrective feedback", async () => {
    const model = new ScriptedChatModel([message({ ...GROUNDED, confidence: 0.9 }), message(GROUNDED)]);

    const result = await compose(model);

    expect(result.attempts).toBe(2);
    expect(model.requests[1]?.messages.slice(-2)).toEqual([
      { role: "assistant", content: JSON.stringify({ ...GROUNDED, confidence: 0.9 }) },
      {
        role: "user",
        content:
          "Your previous response was rejected:\n" +
          "- response: Unrecognized key(s) in object: 'confidence'\n" +
          "Reply again with only the JSON object, following the schema exactly and quoting clause text verbatim.",
      },
    ]);
  });

  it("treats clauses missing from the context as violations", async () => {
    const invented = {
      ...GROUNDED,
      supporting_clauses: [{ id: "Clause 9", text: "Tenant may sublet freely." }],
    };
    const model = new ScriptedChatModel([message(invented), message(GROUNDED)]);

    const result = await compose(model);

    expect(result.attempts).toBe(2);
    expect(model.requests[1]?.messages.at(-1)?.content).toContain(
      "- supporting_clauses.0.text: not found in the provided clauses; quote the clause text exactly",
    );
  });

  it("fails with SchemaViolationError once the retries are spent", async () => {
    const model = new ScriptedChatModel([message("not json"), message("{}"), message("still not json")]);

    const error = await compose(model).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({
      statusCode: 502,
      code: "SCHEMA_VIOLATION",
      message: "The model did not produce a valid, grounded answer after 3 attempts",
    });
    expect(model.requests).toHaveLength(3);
  });

  it("does not retry when no retries are allowed", async () => {
    const model = new ScriptedChatModel([message("{}")]);

    await expect(compose(model, { maxToolRounds: 2, maxSchemaRetries: 0 })).rejects.toMatchObject({
      issues: ["summary: Required", "obligations: Required", "risks: Required", "supporting_clauses: Required"],
    });
  });

  it("accepts an answer that cites nothing when it asserts nothing", async () => {
    const model = new ScriptedChatModel([
      message({ summary: "The clauses do not cover pets.", obligations: [], risks: [], supporting_clauses: [] }),
    ]);

    const result = await compose(model);

    expect(result.answer).toEqual({
      summary: "The clauses do not cover pets.",
      obligations: [],
      risks: [],
      supportingClauses: [],
    });
  });
});
