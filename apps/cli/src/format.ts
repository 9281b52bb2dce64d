import type { AskOutcome, OpenedDocument } from "@contract-qa/core";
import type { HistoryEntry } from "@contract-qa/types";
import { AppError, LoadError, MissingCredentialError } from "@contract-qa/errors";

export function formatOpened(doc: OpenedDocument): string {
  const name = doc.name ?? "document";
  const pages = `${String(doc.pageCount)} page${doc.pageCount === 1 ? "" : "s"}`;
  const chunks = `${String(doc.chunkCount)} chunk${doc.chunkCount === 1 ? "" : "s"}`;
  const source = doc.cached ? "reused cached index" : "indexed";
  return `Loaded ${name}: ${pages}, ${chunks} (${source}).`;
}

export function formatOutcome(outcome: AskOutcome): string {
  if (outcome.status === "failed") return formatError(outcome.error);
  if (outcome.evidence === "") return outcome.rendered;
  return `${outcome.rendered}\n\n### Evidence\n${outcome.evidence}`;
}

export function formatError(error: unknown): string {
  if (error instanceof MissingCredentialError) {
    return `Missing credential: ${error.message}`;
  }
  if (error instanceof LoadError) {
    return `Could not load the document: ${error.message} Please try a different file.`;
  }
  if (AppError.isAppError(error)) {
    return `Error (${error.code}): ${error.message}`;
  }
  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}

export function formatHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) return "(no conversation yet)";
  return history.map((entry) => `${entry.role === "user" ? "You" : "Assistant"}:\n${entry.content}`).join("\n\n");
}
