import { AppError, EmbeddingError } from "@contract-qa/errors";

export function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order regardless of completion order.
 */
export async function mapConcurrent<T, R>(
  items: T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/** HTTP status carried by SDK errors (`status` on OpenAI, `statusCode` on Cohere). */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

export function toEmbeddingError(error: unknown, provider: string): EmbeddingError {
  if (error instanceof EmbeddingError) return error;
  if (AppError.isAppError(error) && error.statusCode === 401) {
    return new EmbeddingError(error.message, provider, { statusCode: 401, cause: error });
  }

  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status === 401 || status === 403) {
    return new EmbeddingError(`${provider} rejected the API key: ${message}`, provider, {
      statusCode: 401,
      cause: error,
    });
  }
  return new EmbeddingError(`${provider} embeddings unavailable: ${message}`, provider, {
    statusCode: 503,
    details: status === undefined ? undefined : { status },
    cause: error,
  });
}

/** Credential failures are the caller's problem, not a sign the backend is down. */
export function isCredentialFailure(error: unknown): boolean {
  return error instanceof EmbeddingError && error.statusCode === 401;
}
