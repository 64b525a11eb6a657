/**
 * Cell reading and normalization.
 *
 * SheetJS cell objects are converted once into a `Cell` union; everything
 * downstream dispatches on `kind` and never touches the raw workbook shape.
 */

import * as XLSX from 'xlsx';
import { formatCalendarDate, parseLenientDate } from './date-parser.js';
import { createChildLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/error-handler.js';
import type { CalendarDate } from '../types/index.js';

const log = createChildLogger({ module: 'cell-normalizer' });

export type ValueCell =
  | { kind: 'blank' }
  | { kind: 'text'; text: string }
  | { kind: 'number'; value: number; display?: string; format?: string }
  | { kind: 'date'; date: CalendarDate }
  | { kind: 'boolean'; value: boolean; display?: string }
  | { kind: 'error'; display: string };

/** Formula cells carry the result cached by the spreadsheet application. */
export type Cell = ValueCell | { kind: 'formula'; formula: string; result: ValueCell };

export interface CellReadOptions {
  /** Workbook uses the 1904 date system (older Mac exports) */
  date1904?: boolean;
}

const MS_PER_DAY = 86_400_000;
const EPOCH_1900 = Date.UTC(1899, 11, 30);
const EPOCH_1904 = Date.UTC(1904, 0, 1);

const INVISIBLE_SPACES = /[\u00A0\u200B\uFEFF]/g;

// Decimal text with a fraction or exponent, e.g. "12345.0" or "1.2345E4"
const DECIMAL_TEXT = /^[+-]?(\d+\.\d*|\.\d+|\d+(\.\d*)?[eE][+-]?\d+)$/;

/**
 * Replace invisible spacing, collapse whitespace and trim.
 * Returns null when nothing is left.
 */
export function normalizeText(text: string): string | null {
  const normalized = text.replace(INVISIBLE_SPACES, ' ').replace(/\s+/g, ' ').trim();
  return normalized.length > 0 ? normalized : null;
}

function serialToCalendarDate(serial: number, date1904: boolean): CalendarDate | null {
  const ms = (date1904 ? EPOCH_1904 : EPOCH_1900) + Math.floor(serial) * MS_PER_DAY;
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return null;
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

function isDateFormat(format: string | number | undefined): format is string {
  return typeof format === 'string' && XLSX.SSF.is_date(format);
}

function toValueCell(cell: XLSX.CellObject, options: CellReadOptions): ValueCell {
  const { v, w } = cell;

  switch (cell.t) {
    case 's':
      return { kind: 'text', text: typeof v === 'string' ? v : (w ?? '') };
    case 'n': {
      if (typeof v !== 'number') return { kind: 'blank' };
      if (isDateFormat(cell.z)) {
        const date = serialToCalendarDate(v, options.date1904 ?? false);
        if (date) return { kind: 'date', date };
      }
      return {
        kind: 'number',
        value: v,
        display: w,
        format: typeof cell.z === 'string' ? cell.z : undefined,
      };
    }
    case 'd':
      if (v instanceof Date) {
        return {
          kind: 'date',
          date: { year: v.getFullYear(), month: v.getMonth() + 1, day: v.getDate() },
        };
      }
      return { kind: 'text', text: w ?? String(v ?? '') };
    case 'b':
      return { kind: 'boolean', value: v === true, display: w };
    case 'e':
      return { kind: 'error', display: w ?? '#ERROR' };
    default:
      return { kind: 'blank' };
  }
}

/**
 * Convert a SheetJS cell object. Absent cells stay null so callers can tell
 * "no cell" from "blank cell".
 */
export function toCell(cell: XLSX.CellObject | undefined, options: CellReadOptions = {}): Cell | null {
  if (!cell) return null;
  const value = toValueCell(cell, options);
  if (cell.f) {
    return { kind: 'formula', formula: cell.f, result: value };
  }
  return value;
}

function valueOf(cell: Cell): ValueCell {
  return cell.kind === 'formula' ? cell.result : cell;
}

function displayText(cell: ValueCell): string | null {
  switch (cell.kind) {
    case 'blank':
      return null;
    case 'text':
      return cell.text;
    case 'number':
      if (cell.display !== undefined) return cell.display;
      return cell.format ? XLSX.SSF.format(cell.format, cell.value) : String(cell.value);
    case 'date':
      return formatCalendarDate(cell.date, 'yyyy-MM-dd');
    case 'boolean':
      return cell.display ?? (cell.value ? 'TRUE' : 'FALSE');
    case 'error':
      return cell.display;
  }
}

function rawText(cell: ValueCell): string | null {
  switch (cell.kind) {
    case 'blank':
      return null;
    case 'text':
      return cell.text;
    case 'number':
    case 'boolean':
      return String(cell.value);
    case 'date':
      return formatCalendarDate(cell.date, 'yyyy-MM-dd');
    case 'error':
      return cell.display;
  }
}

/**
 * Displayed text of a cell, normalized. Never throws: a display failure
 * falls back to the raw value, and a failing fallback gives null.
 */
export function formatCellAsString(cell: Cell | null): string | null {
  if (!cell) return null;
  const value = valueOf(cell);

  try {
    const text = displayText(value);
    return text === null ? null : normalizeText(text);
  } catch (error) {
    log.debug('Cell display failed, using raw value', { kind: value.kind, error: getErrorMessage(error) });
  }

  try {
    const text = rawText(value);
    return text === null ? null : normalizeText(text);
  } catch (error) {
    log.debug('Raw cell value unreadable', { kind: value.kind, error: getErrorMessage(error) });
    return null;
  }
}

/**
 * Render integral decimal text ("12345.0") as a plain integer ("12345").
 * Plain digit strings are returned as-is so leading zeros survive.
 */
export function collapseIntegerText(text: string): string {
  if (!DECIMAL_TEXT.test(text)) return text;
  const value = Number(text);
  const integral = Math.trunc(value);
  if (!Number.isSafeInteger(integral)) return text;
  return Math.abs(value - integral) < 0.0001 ? String(integral) : text;
}

/**
 * String value of a cell as stored on an employee. Date cells render as
 * dd-MM-yyyy.
 */
export function readCellString(cell: Cell | null): string | null {
  if (!cell) return null;
  const value = valueOf(cell);
  if (value.kind === 'date') {
    return formatCalendarDate(value.date, 'dd-MM-yyyy');
  }
  const text = formatCellAsString(cell);
  return text === null ? null : collapseIntegerText(text);
}

/**
 * Calendar date of a cell. Date-typed cells are taken directly; anything else
 * goes through the lenient text parser.
 * @throws DateFormatError when the text matches no accepted pattern
 */
export function readCellDate(cell: Cell | null, referenceDate?: Date): CalendarDate | null {
  if (!cell) return null;
  const value = valueOf(cell);
  if (value.kind === 'date') {
    return value.date;
  }
  const text = formatCellAsString(cell);
  if (!text) return null;
  return parseLenientDate(text, referenceDate);
}
