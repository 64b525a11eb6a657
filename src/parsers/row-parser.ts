import { readCellDate, readCellString } from './cell-normalizer.js';
import { compareCalendarDates, toCalendarDate } from './date-parser.js';
import { POSITIONAL_COLUMN_MAP } from './header-mapper.js';
import { applyRanking } from '../core/ranking.js';
import { DateFormatError, getErrorMessage } from '../utils/error-handler.js';
import { EMPLOYEE_STATUSES } from '../types/index.js';
import type { Cell } from './cell-normalizer.js';
import type {
  CalendarDate,
  CanonicalField,
  ColumnMap,
  Employee,
  EmployeeStatus,
  EmployeeValidator,
  RankingLookup,
} from '../types/index.js';

export interface SheetRow {
  /** 1-based row number as shown in the spreadsheet */
  rowNumber: number;
  /** Cells indexed by zero-based column; null where the sheet has no cell */
  cells: ReadonlyArray<Cell | null>;
}

export interface RowParserContext {
  validator: EmployeeValidator;
  ranking: RankingLookup;
  referenceDate: Date;
}

export type RowOutcome =
  | { ok: true; employee: Employee }
  | { ok: false; error: string };

/** Thrown inside the row pipeline to stop at the first failing check */
class RowRejection extends Error {}

const STATUS_SET: ReadonlySet<string> = new Set(EMPLOYEE_STATUSES);

function isEmployeeStatus(value: string): value is EmployeeStatus {
  return STATUS_SET.has(value);
}

function findStatusIgnoringCase(value: string): EmployeeStatus | undefined {
  const lower = value.toLowerCase();
  return EMPLOYEE_STATUSES.find((status) => status.toLowerCase() === lower);
}

function cellFor(row: SheetRow, columns: ColumnMap, field: CanonicalField): Cell | null {
  const index = columns[field];
  if (index === undefined) return null;
  return row.cells[index] ?? null;
}

function stringField(row: SheetRow, columns: ColumnMap, field: CanonicalField): string | null {
  return readCellString(cellFor(row, columns, field));
}

function dateField(
  row: SheetRow,
  columns: ColumnMap,
  field: CanonicalField,
  referenceDate: Date
): CalendarDate | null {
  return readCellDate(cellFor(row, columns, field), referenceDate);
}

function reject(row: SheetRow, message: string): RowOutcome {
  return { ok: false, error: `Row ${row.rowNumber}: ${message}` };
}

function readEmpId(row: SheetRow, columns: ColumnMap): string {
  const empId = stringField(row, columns, 'empid')?.trim();
  if (!empId) throw new RowRejection('empid is empty');
  return empId;
}

interface RowDates {
  doj: CalendarDate | null;
  resignationDate: CalendarDate | null;
  releasedDate: CalendarDate | null;
}

function readDates(row: SheetRow, columns: ColumnMap, referenceDate: Date): RowDates {
  try {
    return {
      doj: dateField(row, columns, 'doj', referenceDate),
      resignationDate: dateField(row, columns, 'resiznation date', referenceDate),
      releasedDate: dateField(row, columns, 'released date', referenceDate),
    };
  } catch (error) {
    if (error instanceof DateFormatError) {
      throw new RowRejection(`invalid date format - ${error.message}`);
    }
    throw error;
  }
}

function checkDateOrder(dates: RowDates, referenceDate: Date): CalendarDate {
  const { doj, resignationDate, releasedDate } = dates;
  if (!doj) throw new RowRejection('DOJ is required');
  if (compareCalendarDates(doj, toCalendarDate(referenceDate)) > 0) {
    throw new RowRejection('DOJ cannot be in the future');
  }
  if (resignationDate && compareCalendarDates(resignationDate, doj) < 0) {
    throw new RowRejection('Resignation date cannot be before DOJ');
  }
  if (releasedDate && compareCalendarDates(releasedDate, doj) < 0) {
    throw new RowRejection('Release date cannot be before DOJ');
  }
  return doj;
}

function diagnosticSuffix(employee: Employee): string {
  return ` [parsed: EMPID=${employee.empId}, IO_NAME=${employee.ioName}, BU=${employee.bu}, MPR_NO=${employee.mprNo}]`;
}

function buildEmployee(row: SheetRow, columns: ColumnMap, context: RowParserContext): Employee {
  const empId = readEmpId(row, columns);
  const name = stringField(row, columns, 'name');
  const gender = stringField(row, columns, 'gender');
  const nsbtBatchNo = stringField(row, columns, 'nsbt batchno');

  const status = (stringField(row, columns, 'status') ?? '').trim();
  if (!isEmployeeStatus(status)) {
    throw new RowRejection(`invalid status '${status}'`);
  }

  // Read before the date checks so diagnostics can show them
  const grade = stringField(row, columns, 'grade');
  const bu = stringField(row, columns, 'bu');
  const mprNo = stringField(row, columns, 'mpr no');
  const ioName = stringField(row, columns, 'io name');

  const dates = readDates(row, columns, context.referenceDate);
  const doj = checkDateOrder(dates, context.referenceDate);

  const employee: Employee = {
    empId,
    name,
    gender,
    nsbtBatchNo,
    status,
    grade,
    bu,
    mprNo,
    ioName,
    ranking: null,
    doj,
    resignationDate: dates.resignationDate,
    releasedDate: dates.releasedDate,
  };

  const validationErrors = context.validator.validate(employee);
  if (validationErrors.length > 0) {
    throw new RowRejection(validationErrors.join(', ') + diagnosticSuffix(employee));
  }

  return applyRanking(employee, context.ranking);
}

/**
 * Turn one data row into a validated employee, or into exactly one
 * "Row <n>: ..." error. Checks stop at the first failure.
 */
export function parseRow(row: SheetRow, columns: ColumnMap, context: RowParserContext): RowOutcome {
  try {
    return { ok: true, employee: buildEmployee(row, columns, context) };
  } catch (error) {
    return reject(row, getErrorMessage(error));
  }
}

/**
 * Template-order row reading: fixed columns, status matched ignoring case,
 * no date-order checks and no field validation.
 */
export function parseTemplateRow(row: SheetRow, context: RowParserContext): RowOutcome {
  const columns = POSITIONAL_COLUMN_MAP;
  try {
    const empId = readEmpId(row, columns);
    const rawStatus = (stringField(row, columns, 'status') ?? '').trim();
    const status = findStatusIgnoringCase(rawStatus);
    if (!status) throw new RowRejection(`invalid status '${rawStatus}'`);

    const doj = dateField(row, columns, 'doj', context.referenceDate);
    if (!doj) throw new RowRejection('DOJ is required');

    const employee: Employee = {
      empId,
      name: stringField(row, columns, 'name'),
      gender: stringField(row, columns, 'gender'),
      nsbtBatchNo: stringField(row, columns, 'nsbt batchno'),
      status,
      grade: stringField(row, columns, 'grade'),
      bu: stringField(row, columns, 'bu'),
      mprNo: stringField(row, columns, 'mpr no'),
      ioName: stringField(row, columns, 'io name'),
      ranking: null,
      doj,
      releasedDate: dateField(row, columns, 'released date', context.referenceDate),
      resignationDate: dateField(row, columns, 'resiznation date', context.referenceDate),
    };

    return { ok: true, employee: applyRanking(employee, context.ranking) };
  } catch (error) {
    return reject(row, getErrorMessage(error));
  }
}
