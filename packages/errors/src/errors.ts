import { AppError } from "./app-error.js";

export interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized", options?: ErrorExtras) {
    super({ message, statusCode: 401, code: "UNAUTHORIZED", ...options });
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorExtras) {
    super({ message, statusCode: 429, code: "RATE_LIMITED", ...options });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}

export class MissingCredentialError extends AppError {
  public readonly variable: string;

  constructor(variable: string, options?: ErrorExtras) {
    super({
      message: `${variable} is not set. Provide it in the environment, a .env file, or when prompted.`,
      statusCode: 401,
      code: "MISSING_CREDENTIAL",
      ...options,
    });
    this.variable = variable;
  }
}

export type LoadErrorReason =
  | "DOCUMENT_UNREADABLE"
  | "NO_PAGES"
  | "NO_EXTRACTABLE_TEXT"
  | "UNSUPPORTED_DOCUMENT_TYPE";

/**
 * The document could not be turned into text. Fatal for the session: the
 * user has to upload a different file.
 */
export class LoadError extends AppError {
  public readonly reason: LoadErrorReason;

  constructor(message: string, reason: LoadErrorReason, options?: ErrorExtras) {
    super({ message, statusCode: 422, code: reason, ...options });
    this.reason = reason;
  }
}

export class EmptyInputError extends AppError {
  constructor(message = "No text to chunk", options?: ErrorExtras) {
    super({ message, statusCode: 422, code: "EMPTY_INPUT", ...options });
  }
}

/**
 * The embedding backend could not produce vectors. A 401 status marks a
 * credential problem; anything else is treated as the backend being down.
 * Either way the user can retry once the cause is fixed.
 */
export class EmbeddingError extends AppError {
  public readonly provider: string;

  constructor(
    message: string,
    provider: string,
    options?: ErrorExtras & { statusCode?: 401 | 503 },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 503,
      code: "EMBEDDING_UNAVAILABLE",
      details: options?.details,
      cause: options?.cause,
    });
    this.provider = provider;
  }
}

export class SchemaViolationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[], options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "SCHEMA_VIOLATION", ...options });
    this.issues = issues;
  }
}

export class ToolComputationError extends AppError {
  public readonly tool: string;

  constructor(message: string, tool: string, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "TOOL_COMPUTATION_FAILED", ...options });
    this.tool = tool;
  }
}
