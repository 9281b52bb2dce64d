import type { LegalResponse, RetrievedChunk } from "@contract-qa/types";

const ELLIPSIS = /\.{3,}|…/;

/** Case, whitespace, quote and dash differences do not affect grounding. */
export function normalizeForGrounding(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’‚‛′]/g, "'")
    .replace(/[“”„‟″]/g, '"')
    .replace(/[‐-―]/g, "-")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * True when `quote` appears in one of `sources` after normalisation. An
 * ellipsis in the quote stands for omitted text: the fragments around it must
 * appear in the same source, in order.
 */
export function isGrounded(quote: string, sources: readonly string[]): boolean {
  const fragments = normalizeForGrounding(quote)
    .split(ELLIPSIS)
    .map((f) => f.trim())
    .filter((f) => f.length > 0);
  if (fragments.length === 0) return false;

  return sources.some((source) => {
    const haystack = normalizeForGrounding(source);
    let from = 0;
    for (const fragment of fragments) {
      const at = haystack.indexOf(fragment, from);
      if (at < 0) return false;
      from = at + fragment.length;
    }
    return true;
  });
}

/** Problems that make an otherwise well-formed answer unsupported by the context. */
export function groundingIssues(answer: LegalResponse, chunks: readonly RetrievedChunk[]): string[] {
  const sources = chunks.map((c) => c.chunk.content);
  const issues: string[] = [];

  answer.supportingClauses.forEach((clause, i) => {
    if (!isGrounded(clause.text, sources)) {
      issues.push(
        `supporting_clauses.${String(i)}.text: not found in the provided clauses; quote the clause text exactly`,
      );
    }
  });

  if (
    (answer.obligations.length > 0 || answer.risks.length > 0) &&
    answer.supportingClauses.length === 0
  ) {
    issues.push("supporting_clauses: cite at least one clause for the obligations and risks listed");
  }

  return issues;
}
