import { RosterParser } from './roster-parser.js';
import type { RosterParseOptions, RosterParseResult } from '../types/index.js';

/**
 * Parse roster workbook bytes with a one-off parser.
 */
export function parseRoster(
  buffer: Buffer,
  filename?: string,
  options: RosterParseOptions = {}
): RosterParseResult {
  return new RosterParser(options).parse(buffer, filename);
}

// Re-export
export { BaseParser } from './base-parser.js';
export {
  RosterParser,
  parseRosterWorkbook,
  parseTemplateWorkbook,
  NO_SHEETS_ERROR,
  POSITIONAL_FALLBACK_WARNING,
} from './roster-parser.js';
export { parseRow, parseTemplateRow } from './row-parser.js';
export type { SheetRow, RowOutcome, RowParserContext } from './row-parser.js';
export { mapHeaderRow, isUsableHeader, compactHeaderKey, POSITIONAL_COLUMN_MAP, REQUIRED_HEADER_FIELDS } from './header-mapper.js';
export {
  toCell,
  normalizeText,
  formatCellAsString,
  collapseIntegerText,
  readCellString,
  readCellDate,
} from './cell-normalizer.js';
export type { Cell, ValueCell, CellReadOptions } from './cell-normalizer.js';
export {
  parseLenientDate,
  cleanDateText,
  formatCalendarDate,
  compareCalendarDates,
  toCalendarDate,
} from './date-parser.js';
