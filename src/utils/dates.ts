import type { CalendarDate } from '../types.js';

export type DateOrder = 'MDY' | 'DMY';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const MONTH_NAME = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)[a-z]*\\.?';

export const DATE_PATTERNS = {
  iso: /^(\d{4})-(\d{2})-(\d{2})(?!\d)/,
  numeric: /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4}|\d{2})(?!\d)/,
  dayMonthName: new RegExp(`^(\\d{1,2})[\\s-](${MONTH_NAME})[\\s,-]*(\\d{4}|\\d{2})(?!\\d)`, 'i'),
  monthNameDay: new RegExp(`^(${MONTH_NAME})\\s+(\\d{1,2}),?\\s+(\\d{4})(?!\\d)`, 'i'),
} as const;

export interface DateMatch {
  date: CalendarDate;
  length: number;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function expandYear(year: string): number {
  const value = Number(year);
  return year.length === 2 ? 2000 + value : value;
}

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Reads a date at the start of `text`. Ambiguous numeric dates follow `order`
 * unless one field cannot be a month.
 */
export function matchLeadingDate(text: string, order: DateOrder = 'MDY'): DateMatch | null {
  const iso = DATE_PATTERNS.iso.exec(text);
  if (iso) {
    const date = toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    return date ? { date, length: iso[0].length } : null;
  }

  const numeric = DATE_PATTERNS.numeric.exec(text);
  if (numeric) {
    const first = Number(numeric[1]);
    const second = Number(numeric[3]);
    const year = expandYear(numeric[4]);
    const dayFirst = first > 12 || (order === 'DMY' && second <= 12);
    const date = dayFirst ? toCalendarDate(year, second, first) : toCalendarDate(year, first, second);
    return date ? { date, length: numeric[0].length } : null;
  }

  const dayMonth = DATE_PATTERNS.dayMonthName.exec(text);
  if (dayMonth) {
    const date = toCalendarDate(expandYear(dayMonth[3]), monthIndex(dayMonth[2]), Number(dayMonth[1]));
    return date ? { date, length: dayMonth[0].length } : null;
  }

  const monthDay = DATE_PATTERNS.monthNameDay.exec(text);
  if (monthDay) {
    const date = toCalendarDate(Number(monthDay[3]), monthIndex(monthDay[1]), Number(monthDay[2]));
    return date ? { date, length: monthDay[0].length } : null;
  }

  return null;
}

/** `YYYY-MM-DD` in UTC for an epoch-millisecond timestamp. */
export function formatDay(timestamp: number): CalendarDate {
  const date = new Date(timestamp);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}
