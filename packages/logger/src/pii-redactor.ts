/**
 * Keeps credentials and personal contact details out of log output. Contract
 * text regularly quotes the parties' e-mail addresses, so string values are
 * scrubbed as well as known secret-bearing keys.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "openaiapikey",
  "openai_api_key",
  "cohereapikey",
  "cohere_api_key",
  "authorization",
  "cookie",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string" && EMAIL_REGEX.test(value)) {
    // Reset lastIndex because the regex is global
    EMAIL_REGEX.lastIndex = 0;
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level property of a log record.
 * Used as pino's `formatters.log` hook.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = redactValue(key, value);
  }
  return out;
}

/**
 * JSON paths for pino's `redact` option, covering nested objects one level deep.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "openaiApiKey",
  "cohereApiKey",
  "authorization",
  "cookie",
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.openaiApiKey",
  "*.cohereApiKey",
  "*.authorization",
  "*.cookie",
];
