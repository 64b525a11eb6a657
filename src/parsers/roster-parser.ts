/**
 * Employee roster workbook parser.
 *
 * Reads the first sheet of an uploaded roster, finds the header row among the
 * first few rows (or assumes the template column order), and turns every data
 * row into an employee or a row-numbered error. Nothing here throws: open
 * failures and unexpected errors end up in `errors` like row rejections do.
 */

import * as XLSX from 'xlsx';
import { BaseParser } from './base-parser.js';
import { formatCellAsString, toCell } from './cell-normalizer.js';
import { POSITIONAL_COLUMN_MAP, isUsableHeader, mapHeaderRow } from './header-mapper.js';
import { parseRow, parseTemplateRow } from './row-parser.js';
import { SchemaEmployeeValidator } from '../core/employee-validator.js';
import { ConfigRankingLookup } from '../core/ranking.js';
import { getConfig } from '../utils/config.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { createChildLogger } from '../utils/logger.js';
import type { Cell, CellReadOptions } from './cell-normalizer.js';
import type { RowOutcome, RowParserContext, SheetRow } from './row-parser.js';
import type { ColumnMap, RosterParseOptions, RosterParseResult } from '../types/index.js';

const log = createChildLogger({ module: 'roster-parser' });

export const NO_SHEETS_ERROR = 'Workbook has no sheets';

export const POSITIONAL_FALLBACK_WARNING =
  'Warning: header row not detected; positional fallback used (assuming template column order). ' +
  'If columns are shifted, please use the provided template and do not merge header cells.';

export function fatalParseError(error: unknown): string {
  return `Fatal parse error: ${getErrorMessage(error)}`;
}

interface ResolvedColumns {
  columns: ColumnMap;
  /** Zero-based index of the header row; data starts on the next row */
  headerRowIndex: number;
  usedPositionalFallback: boolean;
}

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value && typeof value.t === 'string';
}

class SheetReader {
  readonly range: XLSX.Range | null;

  constructor(
    private readonly sheet: XLSX.WorkSheet,
    private readonly cellOptions: CellReadOptions
  ) {
    const ref = sheet['!ref'];
    this.range = ref ? XLSX.utils.decode_range(ref) : null;
  }

  get firstRow(): number {
    return this.range?.s.r ?? 0;
  }

  get lastRow(): number {
    return this.range ? this.range.e.r : -1;
  }

  /**
   * Cells of a row by absolute column index, or null when the row has no cells.
   */
  readRow(rowIndex: number): SheetRow | null {
    if (!this.range) return null;

    const cells: Array<Cell | null> = [];
    let present = false;
    for (let col = this.range.s.c; col <= this.range.e.c; col++) {
      const raw: unknown = this.sheet[XLSX.utils.encode_cell({ r: rowIndex, c: col })];
      const cell = isCellObject(raw) ? toCell(raw, this.cellOptions) : null;
      cells[col] = cell;
      if (cell) present = true;
    }

    return present ? { rowNumber: rowIndex + 1, cells } : null;
  }
}

function resolveColumns(reader: SheetReader, headerScanRows: number): ResolvedColumns {
  const first = reader.firstRow;
  const lastCandidate = Math.min(first + headerScanRows - 1, reader.lastRow);

  for (let rowIndex = first; rowIndex <= lastCandidate; rowIndex++) {
    const row = reader.readRow(rowIndex);
    if (!row) continue;

    const candidate = mapHeaderRow(row.cells.map((cell) => formatCellAsString(cell)));
    if (isUsableHeader(candidate)) {
      return { columns: candidate, headerRowIndex: rowIndex, usedPositionalFallback: false };
    }
  }

  return { columns: { ...POSITIONAL_COLUMN_MAP }, headerRowIndex: first, usedPositionalFallback: true };
}

function firstSheet(workbook: XLSX.WorkBook): XLSX.WorkSheet | undefined {
  const sheetName = workbook.SheetNames[0];
  return sheetName === undefined ? undefined : workbook.Sheets[sheetName];
}

function buildContext(options: RosterParseOptions): RowParserContext {
  return {
    validator: options.validator ?? new SchemaEmployeeValidator(),
    ranking: options.ranking ?? new ConfigRankingLookup(),
    referenceDate: options.referenceDate ?? new Date(),
  };
}

function collect(result: RosterParseResult, outcome: RowOutcome): void {
  if (outcome.ok) {
    result.employees.push(outcome.employee);
  } else {
    log.debug('Row rejected', { error: outcome.error });
    result.errors.push(outcome.error);
  }
}

function openSheet(workbook: XLSX.WorkBook, result: RosterParseResult): SheetReader | null {
  const sheet = firstSheet(workbook);
  if (!sheet) {
    result.errors.push(NO_SHEETS_ERROR);
    return null;
  }
  const date1904 = workbook.Workbook?.WBProps?.date1904 ?? false;
  return new SheetReader(sheet, { date1904 });
}

/**
 * Header-aware parse of an opened workbook (first sheet only).
 */
export function parseRosterWorkbook(
  workbook: XLSX.WorkBook,
  options: RosterParseOptions = {},
  filename?: string
): RosterParseResult {
  const result: RosterParseResult = { employees: [], errors: [] };

  try {
    const reader = openSheet(workbook, result);
    if (!reader) {
      log.warn('Roster workbook has no sheets', { filename });
      return result;
    }

    const context = buildContext(options);
    const headerScanRows = options.headerScanRows ?? getConfig().parsing.headerScanRows;
    const { columns, headerRowIndex, usedPositionalFallback } = resolveColumns(reader, headerScanRows);

    if (usedPositionalFallback) {
      log.warn('Header row not detected, using template column order', { filename });
    } else {
      log.info('Header row detected', { filename, headerRow: headerRowIndex + 1, columns });
    }

    for (let rowIndex = headerRowIndex + 1; rowIndex <= reader.lastRow; rowIndex++) {
      const row = reader.readRow(rowIndex);
      if (!row) continue;
      collect(result, parseRow(row, columns, context));
    }

    if (usedPositionalFallback) {
      result.errors.unshift(POSITIONAL_FALLBACK_WARNING);
    }
  } catch (error) {
    log.error('Roster parsing failed', { filename, error: getErrorMessage(error) });
    result.errors.push(fatalParseError(error));
  }

  log.info('Roster parsed', {
    filename,
    employees: result.employees.length,
    errors: result.errors.length,
  });
  return result;
}

/**
 * Strict template-order parse: data from the second row on, no header
 * detection and no field validation.
 */
export function parseTemplateWorkbook(
  workbook: XLSX.WorkBook,
  options: RosterParseOptions = {},
  filename?: string
): RosterParseResult {
  const result: RosterParseResult = { employees: [], errors: [] };

  try {
    const reader = openSheet(workbook, result);
    if (!reader) return result;

    const context = buildContext(options);
    for (let rowIndex = Math.max(1, reader.firstRow); rowIndex <= reader.lastRow; rowIndex++) {
      const row = reader.readRow(rowIndex);
      if (!row) continue;
      collect(result, parseTemplateRow(row, context));
    }
  } catch (error) {
    log.error('Template roster parsing failed', { filename, error: getErrorMessage(error) });
    result.errors.push(fatalParseError(error));
  }

  log.info('Template roster parsed', {
    filename,
    employees: result.employees.length,
    errors: result.errors.length,
  });
  return result;
}

export class RosterParser extends BaseParser<RosterParseResult> {
  readonly supportedExtensions = ['xlsx', 'xlsm', 'xls'];

  constructor(private readonly options: RosterParseOptions = {}) {
    super();
  }

  parse(buffer: Buffer, filename?: string): RosterParseResult {
    log.debug('Parsing roster workbook', { filename, mode: this.options.mode ?? 'header' });

    let workbook: XLSX.WorkBook;
    try {
      // cellNF keeps number formats so date-formatted serials can be told apart
      workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true });
    } catch (error) {
      log.error('Failed to open roster workbook', { filename, error: getErrorMessage(error) });
      return { employees: [], errors: [fatalParseError(error)] };
    }

    return this.options.mode === 'template'
      ? parseTemplateWorkbook(workbook, this.options, filename)
      : parseRosterWorkbook(workbook, this.options, filename);
  }
}
