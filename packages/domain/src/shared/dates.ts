/**
 * @fileoverview Date input parsing and horizon arithmetic
 *
 * Report filters accept dates the way operators type them: ISO, day-first
 * with slashes or dashes, day with a month name, month-only and year-only.
 * Month-only and year-only input resolves to the first day of the period for
 * a range start and to the last day for a range end.
 *
 * @module domain/shared/dates
 */

import {
  addMonths,
  endOfMonth,
  endOfYear,
  format,
  isAfter,
  isExists,
  isValid,
  parse,
  startOfDay,
  startOfMonth,
  startOfYear,
} from 'date-fns';
import { toText } from '@medstock/core';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/** Whether a date bounds the start or the end of a range */
export type DateRole = 'from' | 'to';

export interface DateRange {
  readonly from: Date | null;
  readonly to: Date | null;
}

// Reference for date-fns parse; every accepted format carries a full year
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Full dates, tried in order
 */
const FULL_DATE_PATTERNS: ReadonlyArray<(text: string) => Date | null> = [
  (text) => fromParts(/^(\d{4})-(\d{2})-(\d{2})$/.exec(text), 'ymd'),
  (text) => fromParts(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text), 'dmy'),
  (text) => fromParts(/^(\d{1,2})-(\d{1,2})-(\d{4})$/.exec(text), 'dmy'),
  (text) => (/^\d{1,2} [A-Za-z]{3} \d{4}$/.test(text) ? fromFormat(text, 'd MMM yyyy') : null),
  (text) => (/^\d{1,2} [A-Za-z]+ \d{4}$/.test(text) ? fromFormat(text, 'd MMMM yyyy') : null),
  (text) => fromParts(/^(\d{4})\/(\d{1,2})\/(\d{1,2})$/.exec(text), 'ymd'),
];

/**
 * Month-only input, resolved to the first day of that month
 */
const MONTH_PATTERNS: ReadonlyArray<(text: string) => Date | null> = [
  (text) => monthFromParts(/^(\d{4})-(\d{1,2})$/.exec(text), 1, 2),
  (text) => monthFromParts(/^(\d{1,2})\/(\d{4})$/.exec(text), 2, 1),
  (text) => (/^[A-Za-z]{3}-\d{4}$/.test(text) ? fromFormat(text, 'MMM-yyyy') : null),
  (text) => (/^[A-Za-z]+-\d{4}$/.test(text) ? fromFormat(text, 'MMMM-yyyy') : null),
];

function toDate(year: number, month: number, day: number): Date | null {
  return isExists(year, month - 1, day) ? new Date(year, month - 1, day) : null;
}

function fromParts(match: RegExpExecArray | null, order: 'ymd' | 'dmy'): Date | null {
  if (!match) return null;
  const [, first = '', second = '', third = ''] = match;
  return order === 'ymd'
    ? toDate(Number(first), Number(second), Number(third))
    : toDate(Number(third), Number(second), Number(first));
}

function monthFromParts(
  match: RegExpExecArray | null,
  yearGroup: number,
  monthGroup: number
): Date | null {
  if (!match) return null;
  return toDate(Number(match[yearGroup]), Number(match[monthGroup]), 1);
}

function fromFormat(text: string, pattern: string): Date | null {
  const parsed = parse(text, pattern, REFERENCE_DATE);
  return isValid(parsed) ? parsed : null;
}

/**
 * Parse a date typed by an operator
 *
 * @returns the resolved day, or `null` when the text is blank or unrecognised
 *
 * @example
 * ```typescript
 * parseUserDate('2024-03-05', 'from'); // 5 Mar 2024
 * parseUserDate('02/2024', 'to');      // 29 Feb 2024
 * parseUserDate('2023', 'from');       // 1 Jan 2023
 * ```
 */
export function parseUserDate(text: string | null | undefined, role: DateRole): Date | null {
  const raw = text?.trim().replace(/\s+/g, ' ') ?? '';
  if (raw === '') return null;

  for (const pattern of FULL_DATE_PATTERNS) {
    const date = pattern(raw);
    if (date) return date;
  }

  for (const pattern of MONTH_PATTERNS) {
    const month = pattern(raw);
    if (month) return role === 'from' ? startOfMonth(month) : startOfDay(endOfMonth(month));
  }

  if (/^\d{4}$/.test(raw)) {
    const year = toDate(Number(raw), 1, 1);
    if (year) return role === 'from' ? startOfYear(year) : startOfDay(endOfYear(year));
  }

  return null;
}

/**
 * Resolve a from/to pair
 *
 * An end date after `today` is clamped to `today`. A reversed range is kept
 * as given and matches nothing.
 */
export function resolveDateRange(
  fromText: string | null | undefined,
  toText: string | null | undefined,
  today: Date
): DateRange {
  const from = parseUserDate(fromText, 'from');
  let to = parseUserDate(toText, 'to');

  const todayStart = startOfDay(today);
  if (to && isAfter(to, todayStart)) {
    to = todayStart;
  }

  return { from, to };
}

/**
 * `today` plus a number of months, the day clamped to the end of the month
 */
export function addHorizonMonths(today: Date, months: number): Date {
  return addMonths(startOfDay(today), months);
}

export function formatIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

/**
 * Render a driver date value as `YYYY-MM-DD`; text is passed through trimmed
 */
export function normalizeDateValue(value: unknown): string {
  if (value instanceof Date) {
    return isValid(value) ? formatIsoDate(value) : '';
  }
  return toText(value);
}
