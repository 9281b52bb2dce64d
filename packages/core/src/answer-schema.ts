import { z } from "zod";
import type { LegalResponse, ResponseSchema } from "@contract-qa/types";

const clauseReferenceSchema = z
  .object({
    id: z.string(),
    text: z.string(),
  })
  .strict();

/** Wire shape of the model's answer; unknown keys are rejected. */
export const legalResponseSchema = z
  .object({
    summary: z.string(),
    obligations: z.array(z.string()),
    risks: z.array(z.string()),
    supporting_clauses: z.array(clauseReferenceSchema),
  })
  .strict()
  .transform(
    (wire): LegalResponse => ({
      summary: wire.summary,
      obligations: wire.obligations,
      risks: wire.risks,
      supportingClauses: wire.supporting_clauses,
    }),
  );

/** JSON schema sent to the model as its structured-output contract. */
export const LEGAL_RESPONSE_SCHEMA: ResponseSchema = {
  name: "legal_response",
  schema: {
    type: "object",
    properties: {
      summary: { type: "string", description: "Executive summary of the answer" },
      obligations: {
        type: "array",
        items: { type: "string" },
        description: "List of obligations",
      },
      risks: {
        type: "array",
        items: { type: "string" },
        description: "List of risks and penalties",
      },
      supporting_clauses: {
        type: "array",
        description: "Evidence clauses",
        items: {
          type: "object",
          properties: {
            id: { type: "string", description: "Clause label or section number" },
            text: { type: "string", description: "Text copied verbatim from the clause" },
          },
          required: ["id", "text"],
          additionalProperties: false,
        },
      },
    },
    required: ["summary", "obligations", "risks", "supporting_clauses"],
    additionalProperties: false,
  },
};

export type ParsedAnswer =
  | { ok: true; answer: LegalResponse }
  | { ok: false; issues: string[] };

export function parseLegalResponse(raw: string): ParsedAnswer {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, issues: [`Response is not valid JSON: ${reason}`] };
  }

  const parsed = legalResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "response"}: ${issue.message}`,
      ),
    };
  }
  return { ok: true, answer: parsed.data };
}
