// Marker and amount are captured together; the amount is either grouped in
// thousands or a plain digit run, with optional two-digit cents.
const MONEY_PATTERN =
  /(?:\$|(?<![A-Za-z])USD|€|(?<![A-Za-z])EUR|£)\s?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?(?!\d)/g;

/** Monetary amounts in order of first occurrence, without duplicates. */
export function extractMonetaryValues(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(MONEY_PATTERN)) {
    seen.add(match[0]);
  }
  return [...seen];
}
