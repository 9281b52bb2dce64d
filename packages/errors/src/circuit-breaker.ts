import CircuitBreaker from "opossum";
import type { Logger } from "@contract-qa/logger";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Calls in the rolling window before the error percentage is considered. Default: 5 */
  volumeThreshold?: number;
  /** Errors for which this returns true do not count towards opening the circuit. */
  errorFilter?: (err: unknown) => boolean;
  /** Receives state changes. */
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<
  Pick<
    CircuitBreakerOptions,
    "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold"
  >
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const { logger, ...breakerOptions }: CircuitBreakerOptions = options ?? {};
  const mergedOptions = { ...DEFAULT_OPTIONS, ...breakerOptions, name };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit OPENED (requests will be short-circuited)");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "circuit HALF-OPEN (next request is a test)");
  });

  breaker.on("close", () => {
    logger?.warn({ breaker: name }, "circuit CLOSED (back to normal)");
  });

  return breaker;
}
