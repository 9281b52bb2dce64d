import type { RetrievedChunk } from "@contract-qa/types";

export function clauseLabel(rank: number): string {
  return `Clause ${String(rank)}`;
}

/**
 * Formats retrieved chunks as labelled clauses, in rank order, separated by
 * blank lines. The labels are what answers cite as clause ids.
 */
export function assembleContext(chunks: readonly RetrievedChunk[]): string {
  return chunks.map((c) => `[${clauseLabel(c.rank)}]: ${c.chunk.content}`).join("\n\n");
}
