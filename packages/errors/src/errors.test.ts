import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
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

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root cause");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.cause).toBeUndefined();
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("Error Subclasses", () => {
  it("UnauthorizedError has status 401 and UNAUTHORIZED code", () => {
    const err = new UnauthorizedError();
    expect(err.statusCode).toBe(401);
    expect(err.code).toBe("UNAUTHORIZED");
    expect(err.name).toBe("UnauthorizedError");
  });

  it("RateLimitedError has status 429, RATE_LIMITED code, and retryAfter", () => {
    const err = new RateLimitedError("Too many requests", 60);
    expect(err.statusCode).toBe(429);
    expect(err.code).toBe("RATE_LIMITED");
    expect(err.retryAfter).toBe(60);
  });

  it("ValidationError has status 400, VALIDATION_ERROR code, and fields", () => {
    const fields = { overlap: "must be smaller than chunkSize" };
    const err = new ValidationError("Invalid chunking config", fields);
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.fields).toEqual(fields);
  });

  it("ExternalServiceError has status 502 and service", () => {
    const err = new ExternalServiceError("chat backend is down", "openai");
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("EXTERNAL_SERVICE_ERROR");
    expect(err.service).toBe("openai");
  });

  it("MissingCredentialError names the variable", () => {
    const err = new MissingCredentialError("OPENAI_API_KEY");
    expect(err.statusCode).toBe(401);
    expect(err.code).toBe("MISSING_CREDENTIAL");
    expect(err.variable).toBe("OPENAI_API_KEY");
    expect(err.message).toBe(
      "OPENAI_API_KEY is not set. Provide it in the environment, a .env file, or when prompted.",
    );
  });

  it("LoadError uses the reason as its code", () => {
    const err = new LoadError("scanned document", "NO_EXTRACTABLE_TEXT");
    expect(err.statusCode).toBe(422);
    expect(err.code).toBe("NO_EXTRACTABLE_TEXT");
    expect(err.reason).toBe("NO_EXTRACTABLE_TEXT");
    expect(err.name).toBe("LoadError");
  });

  it("EmptyInputError has status 422 and EMPTY_INPUT code", () => {
    const err = new EmptyInputError();
    expect(err.statusCode).toBe(422);
    expect(err.code).toBe("EMPTY_INPUT");
    expect(err.message).toBe("No text to chunk");
  });

  it("EmbeddingError defaults to 503 and accepts 401 for credential problems", () => {
    const down = new EmbeddingError("backend down", "openai");
    const rejected = new EmbeddingError("bad key", "openai", { statusCode: 401 });

    expect(down.statusCode).toBe(503);
    expect(down.code).toBe("EMBEDDING_UNAVAILABLE");
    expect(down.provider).toBe("openai");
    expect(rejected.statusCode).toBe(401);
  });

  it("SchemaViolationError carries the issues", () => {
    const err = new SchemaViolationError("no conformant answer", ["summary: Required"]);
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("SCHEMA_VIOLATION");
    expect(err.issues).toEqual(["summary: Required"]);
  });

  it("ToolComputationError names the tool", () => {
    const err = new ToolComputationError("days must be an integer", "calculate_deadline");
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("TOOL_COMPUTATION_FAILED");
    expect(err.tool).toBe("calculate_deadline");
  });
});
