import { ValidationError } from './errors';

const DAY_MS = 24 * 60 * 60 * 1000;

function parseCalendarDate(date: string): Date {
  const parsed = new Date(`${date}T00:00:00.000Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid calendar date: ${date}`);
  }
  return parsed;
}

export function toCalendarDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/** UTC calendar date of an ISO timestamp. */
export function calendarDateOf(timestamp: string): string {
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid timestamp: ${timestamp}`);
  }
  return toCalendarDate(parsed);
}

export function normaliseTimestamp(timestamp: string): string {
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid timestamp: ${timestamp}`);
  }
  return parsed.toISOString();
}

export function addDays(date: string, days: number): string {
  return toCalendarDate(new Date(parseCalendarDate(date).getTime() + days * DAY_MS));
}

/** Adds calendar months, clamping to the last day of the target month. */
export function addMonths(date: string, months: number): string {
  const parsed = parseCalendarDate(date);
  const target = new Date(Date.UTC(parsed.getUTCFullYear(), parsed.getUTCMonth() + months, 1));
  const lastDay = new Date(Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)).getUTCDate();
  target.setUTCDate(Math.min(parsed.getUTCDate(), lastDay));
  return toCalendarDate(target);
}

export function lastDayOfMonth(year: number, month: number): string {
  return toCalendarDate(new Date(Date.UTC(year, month, 0)));
}
