/**
 * @module shared/age
 * Timestamp parsing and age helpers used by search ranking and the CLI.
 * Stored timestamps are UTC; values without a zone designator are read as UTC.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Age assigned to turns whose timestamp is missing or unreadable. */
export const FALLBACK_AGE_DAYS = 365;

/** SQLite's datetime('now') form: "YYYY-MM-DD HH:MM:SS[.SSS]". */
const SQLITE_DATETIME_RE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

/** ISO date-time without "Z" or a numeric offset. */
const NAIVE_ISO_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse a stored timestamp into a Date.
 *
 * @param value - ISO-8601 string or SQLite datetime string
 * @returns The parsed Date, or null when the value is empty or invalid
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();

  let normalized = trimmed;
  if (SQLITE_DATETIME_RE.test(trimmed)) {
    normalized = trimmed.replace(" ", "T") + "Z";
  } else if (NAIVE_ISO_RE.test(trimmed)) {
    normalized = trimmed + "Z";
  }

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Days elapsed between a stored timestamp and `now`.
 * Falls back to {@link FALLBACK_AGE_DAYS} for missing or unparsable values.
 */
export function ageInDays(
  timestamp: string | null | undefined,
  now: Date = new Date(),
): number {
  const parsed = parseTimestamp(timestamp);
  if (!parsed) return FALLBACK_AGE_DAYS;
  return (now.getTime() - parsed.getTime()) / MS_PER_DAY;
}

/** Render an age in days as a compact relative label ("5h ago", "3w ago"). */
export function formatAge(days: number): string {
  if (days < 1) {
    const hours = Math.max(1, Math.trunc(days * 24));
    return `${hours}h ago`;
  }
  if (days < 7) return `${Math.trunc(days)}d ago`;
  if (days < 30) return `${Math.trunc(days / 7)}w ago`;
  if (days < 365) return `${Math.trunc(days / 30)}mo ago`;
  return `${Math.trunc(days / 365)}y ago`;
}
