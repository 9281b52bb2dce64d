import { describe, it, expect } from "vitest";
import type { RetrievedChunk } from "@contract-qa/types";
import { assembleContext } from "./context-assembler.js";

function retrieved(rank: number, content: string): RetrievedChunk {
  return {
    rank,
    score: 1 - rank / 10,
    chunk: { id: `chunk-${rank}`, index: rank - 1, content, startChar: 0, endChar: content.length },
  };
}

describe("assembleContext", () => {
  it("returns empty string for no chunks", () => {
    expect(assembleContext([])).toBe("");
  });

  it("labels chunks by rank and separates them with blank lines", () => {
    const result = assembleContext([
      retrieved(1, "First chunk content."),
      retrieved(2, "Second chunk content."),
    ]);

    expect(result).toBe("[Clause 1]: First chunk content.\n\n[Clause 2]: Second chunk content.");
  });

  it("keeps chunk content untouched", () => {
    const result = assembleContext([retrieved(1, "  indented\nline  ")]);

    expect(result).toBe("[Clause 1]:   indented\nline  ");
  });
});
