/**
 * @contract-qa/logger
 *
 * Structured logging with secret redaction for the contract QA pipeline.
 */

export { createLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";
