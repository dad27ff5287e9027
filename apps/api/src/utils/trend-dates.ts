export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}))?$/;

export type TrendDate = {
  date: Date;
  hasHour: boolean;
};

/**
 * Parse 'YYYY-MM-DD' or 'YYYY-MM-DDThh' as a UTC instant.
 * Returns null for anything else, including impossible calendar dates.
 */
export function parseTrendDate(value: string): TrendDate | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const [, year, month, day, hour] = match;
  const y = Number(year);
  const m = Number(month) - 1;
  const d = Number(day);
  const h = hour === undefined ? 0 : Number(hour);
  if (h > 23) return null;

  const date = new Date(Date.UTC(y, m, d, h));
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== m ||
    date.getUTCDate() !== d
  ) {
    return null;
  }

  return { date, hasHour: hour !== undefined };
}

/** 'YYYY-MM-DD' */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** 'YYYY-MM-DDThh' */
export function formatDateHour(date: Date): string {
  return date.toISOString().slice(0, 13);
}

export function floorToHour(date: Date): Date {
  return new Date(Math.floor(date.getTime() / HOUR_MS) * HOUR_MS);
}

export function floorToDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / DAY_MS) * DAY_MS);
}

/**
 * Shift by whole calendar months; the day is clamped to the target month's
 * last day (Mar 31 - 1 month = Feb 28/29).
 */
export function addMonthsUTC(date: Date, months: number): Date {
  const target = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1, date.getUTCHours())
  );
  const lastDay = new Date(
    Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)
  ).getUTCDate();
  target.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return target;
}

/** Whole calendar months from `start` to `end`. */
export function monthsBetween(start: Date, end: Date): number {
  let months =
    (end.getUTCFullYear() - start.getUTCFullYear()) * 12 +
    (end.getUTCMonth() - start.getUTCMonth());
  if (end.getUTCDate() < start.getUTCDate()) months -= 1;
  return Math.max(months, 0);
}
