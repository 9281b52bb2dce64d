export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  UnauthorizedError,
  RateLimitedError,
  ValidationError,
  ExternalServiceError,
  MissingCredentialError,
  LoadError,
  EmptyInputError,
  EmbeddingError,
  SchemaViolationError,
  ToolComputationError,
} from "./errors.js";
export type { ErrorExtras, LoadErrorReason } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
