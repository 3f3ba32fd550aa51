import { DAY_NAMES, type DayName, type WeekDay } from "./types.js";

export const DAYS_PER_WEEK = 7;
export const HOURS_PER_DAY = 24;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Formats a date as YYYY-MM-DD string (local time)
 */
export function formatDateString(date: Date): string {
  const year = date.getFullYear();
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const day = date.getDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parses a YYYY-MM-DD string to a local-midnight Date.
 *
 * Returns `undefined` for anything that is not a real calendar date, so
 * `"2026-02-30"` is rejected rather than rolled into March.
 */
export function parseDateString(value: string): Date | undefined {
  const match = ISO_DATE.exec(value);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * Returns a new date `days` calendar days after `date`.
 */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

/**
 * Returns the Sunday that starts the week containing `reference`, at
 * midnight local time.
 *
 * @example
 * ```typescript
 * weekStart(new Date(2026, 9, 21, 15, 30)); // Wednesday
 * // Returns: Sunday 2026-10-18 00:00
 * ```
 */
export function weekStart(reference: Date): Date {
  const start = new Date(reference);
  start.setHours(0, 0, 0, 0);
  // getDay() is 0 for Sunday
  start.setDate(start.getDate() - start.getDay());
  return start;
}

/**
 * Builds the row label for a day, e.g. `"Monday 2026-10-19"`.
 */
export function formatDayLabel(name: DayName, date: string): string {
  return `${name} ${date}`;
}

/**
 * Reads the weekday name back out of a row label.
 *
 * Only the leading word is inspected so labels written by older tooling
 * (`"Saturday (24/10)"`) still resolve.
 */
export function dayNameFromLabel(label: string): DayName | undefined {
  const first = label.trim().split(/[\s(]/, 1)[0]?.toLowerCase();
  return DAY_NAMES.find((name) => name.toLowerCase() === first);
}

/**
 * The seven days of the week starting at `start` (a Sunday).
 *
 * @example
 * ```typescript
 * weekDays(new Date(2026, 9, 18)).map((d) => d.label);
 * // ["Sunday 2026-10-18", "Monday 2026-10-19", ..., "Saturday 2026-10-24"]
 * ```
 */
export function weekDays(start: Date): WeekDay[] {
  return DAY_NAMES.map((name, index) => {
    const date = formatDateString(addDays(start, index));
    return { name, date, label: formatDayLabel(name, date), index };
  });
}
