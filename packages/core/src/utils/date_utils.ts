/**
 * Calendar-date helpers. Dates travel as `YYYY-MM-DD` strings and are
 * compared as whole UTC days so time zones never shift a deadline.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Source of the current instant. Injected so tests can pin time.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Parses a `YYYY-MM-DD` string into a day number (days since epoch).
 * Month and day may omit the leading zero (`2025-3-5`). Returns null for
 * malformed strings and impossible dates such as 2025-02-30.
 */
export function parseCalendarDate(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = CALENDAR_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const utc = new Date(Date.UTC(year, month - 1, day));

  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day
  ) {
    return null;
  }
  return utc.getTime() / MS_PER_DAY;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/**
 * Formats the local calendar day of `date` as `YYYY-MM-DD`.
 */
export function formatCalendarDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 * Null if either side is not a valid calendar date.
 */
export function daysBetween(from: string, to: string): number | null {
  const start = parseCalendarDate(from);
  const end = parseCalendarDate(to);
  if (start === null || end === null) return null;
  return end - start;
}
