export { buildDocumentIndex } from "./ingestion-pipeline.js";
export type { IngestionDependencies } from "./ingestion-pipeline.js";

export { documentCacheKey } from "./document-key.js";
export { summarizeIndex } from "./document-index.js";
export type { DocumentIndex } from "./document-index.js";

export { IndexCache } from "./index-cache.js";
export type { IndexCacheOptions, CacheLookup } from "./index-cache.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { assembleContext, clauseLabel } from "./context-assembler.js";
export { legalResponseSchema, LEGAL_RESPONSE_SCHEMA, parseLegalResponse } from "./answer-schema.js";
export type { ParsedAnswer } from "./answer-schema.js";
export { isGrounded, groundingIssues, normalizeForGrounding } from "./grounding.js";
export { composeAnswer, buildUserMessage, SYSTEM_PROMPT } from "./answer-composer.js";
export type { ComposerDependencies } from "./answer-composer.js";
export { renderAnswer, renderEvidence } from "./render.js";

export { ContractSession } from "./session.js";
export type { SessionDependencies, OpenedDocument, AskOutcome } from "./session.js";
