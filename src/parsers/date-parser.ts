/**
 * Lenient date parsing for roster cells.
 *
 * Spreadsheet exports disagree on date punctuation and month-name casing, so
 * values are tried against a fixed pattern list, first as written and then
 * once more after punctuation cleanup. The cleanup pass only runs when the
 * exact pass fails, which keeps valid ISO dates untouched.
 */

import { isValid, parse } from 'date-fns';
import { DateFormatError } from '../utils/error-handler.js';
import type { CalendarDate } from '../types/index.js';

interface DatePattern {
  /** date-fns format string */
  format: string;
  /** Exact shape the text must have; date-fns alone accepts shorter fields */
  shape: RegExp;
  /** Overrides the caller's reference date when resolving the pattern */
  referenceDate?: Date;
}

// date-fns places `yy` in the century nearest the reference year; from 2050
// that is always 2000-2099.
const TWO_DIGIT_YEAR_BASE = new Date(2050, 0, 1);

// Order matters: first match wins.
const DATE_PATTERNS: readonly DatePattern[] = [
  { format: 'yyyy-MM-dd', shape: /^\d{4}-\d{2}-\d{2}$/ },
  { format: 'dd-MM-yyyy', shape: /^\d{2}-\d{2}-\d{4}$/ },
  { format: 'dd-MMM-yyyy', shape: /^\d{2}-[A-Za-z]{3}-\d{4}$/ },
  { format: 'dd-MMM-yy', shape: /^\d{2}-[A-Za-z]{3}-\d{2}$/, referenceDate: TWO_DIGIT_YEAR_BASE },
  { format: 'dd/MM/yyyy', shape: /^\d{2}\/\d{2}\/\d{4}$/ },
];

export type CalendarDateFormat = 'dd-MM-yyyy' | 'yyyy-MM-dd';

export function toCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function formatCalendarDate(date: CalendarDate, format: CalendarDateFormat = 'yyyy-MM-dd'): string {
  const dd = String(date.day).padStart(2, '0');
  const mm = String(date.month).padStart(2, '0');
  const yyyy = String(date.year).padStart(4, '0');
  return format === 'dd-MM-yyyy' ? `${dd}-${mm}-${yyyy}` : `${yyyy}-${mm}-${dd}`;
}

function tryPatterns(text: string, referenceDate: Date): CalendarDate | null {
  for (const pattern of DATE_PATTERNS) {
    if (!pattern.shape.test(text)) continue;
    const parsed = parse(text, pattern.format, pattern.referenceDate ?? referenceDate);
    if (isValid(parsed)) {
      return toCalendarDate(parsed);
    }
  }
  return null;
}

/**
 * Replace dots, whitespace runs and any other punctuation with "-".
 */
export function cleanDateText(text: string): string {
  return text
    .replace(/\./g, '-')
    .replace(/\s+/g, '-')
    .replace(/[^0-9A-Za-z-]/g, '-');
}

/**
 * Parse a normalized, non-empty cell text as a calendar date.
 * @throws DateFormatError carrying the original text when no pattern matches
 */
export function parseLenientDate(text: string, referenceDate: Date = new Date()): CalendarDate {
  const exact = tryPatterns(text, referenceDate);
  if (exact) return exact;

  const cleaned = tryPatterns(cleanDateText(text), referenceDate);
  if (cleaned) return cleaned;

  throw new DateFormatError(text);
}
