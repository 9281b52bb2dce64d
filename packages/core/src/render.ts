import type { ClauseReference, LegalResponse } from "@contract-qa/types";

function bullets(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

/** Markdown answer: summary, then obligations and risks when there are any. */
export function renderAnswer(answer: LegalResponse): string {
  const sections = [`### Summary\n${answer.summary}`];
  if (answer.obligations.length > 0) {
    sections.push(`### Obligations\n${bullets(answer.obligations)}`);
  }
  if (answer.risks.length > 0) {
    sections.push(`### Risks & Penalties\n${bullets(answer.risks)}`);
  }
  return sections.join("\n\n");
}

/** One line per clause; clause text is collapsed onto that line. */
export function renderEvidence(clauses: readonly ClauseReference[]): string {
  return clauses
    .map((clause) => `**${clause.id}**: *${clause.text.replace(/\s+/g, " ").trim()}*`)
    .join("\n");
}
