export const DEADLINE_FORMAT_ERROR = "Error: Use YYYY-MM-DD format.";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/** Parses a strict YYYY-MM-DD calendar date as UTC midnight. */
export function parseIsoDate(value: string): Date | undefined {
  const match = ISO_DATE.exec(value);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return undefined;

  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 onto 1900-1999.
  date.setUTCFullYear(year);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Adds `days` calendar days to `startDate`. Malformed or impossible dates,
 * non-integer day counts and results outside years 1-9999 yield
 * {@link DEADLINE_FORMAT_ERROR} rather than throwing.
 */
export function calculateDeadline(startDate: string, days: number): string {
  const start = parseIsoDate(startDate);
  if (!start || !Number.isSafeInteger(days)) return DEADLINE_FORMAT_ERROR;

  const deadline = new Date(start.getTime() + days * MS_PER_DAY);
  const year = deadline.getUTCFullYear();
  if (Number.isNaN(year) || year < 1 || year > 9999) return DEADLINE_FORMAT_ERROR;
  return formatIsoDate(deadline);
}
