/**
 * Core type definitions for the roster ingestion system
 */

export const EMPLOYEE_STATUSES = [
  'Allocated',
  'Under Training',
  'Resigned',
  'Terminated',
  'Temp Allocation',
  'Waiting for Allocation',
] as const;

export type EmployeeStatus = (typeof EMPLOYEE_STATUSES)[number];

/**
 * A date without time of day or zone. Month is 1-12.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface Employee {
  empId: string;
  name: string | null;
  gender: string | null;
  nsbtBatchNo: string | null;
  status: EmployeeStatus;
  grade: string | null;
  bu: string | null;
  mprNo: string | null;
  ioName: string | null;
  ranking: string | null;
  doj: CalendarDate;
  resignationDate: CalendarDate | null;
  releasedDate: CalendarDate | null;
}

/**
 * Outcome of one roster parse. Warnings share the errors list.
 */
export interface RosterParseResult {
  employees: Employee[];
  errors: string[];
}

/**
 * Canonical column keys. "resiznation date" is the legacy key used by
 * existing templates and column maps; keep the spelling.
 */
export type CanonicalField =
  | 'empid'
  | 'name'
  | 'gender'
  | 'doj'
  | 'resiznation date'
  | 'released date'
  | 'nsbt batchno'
  | 'status'
  | 'grade'
  | 'bu'
  | 'mpr no'
  | 'io name';

export type ColumnMap = Partial<Record<CanonicalField, number>>;

export type ParseMode = 'header' | 'template';

/**
 * Field-level validation applied to a row once every field is read.
 * Returns human-readable failures; an empty list means the record is valid.
 */
export interface EmployeeValidator {
  validate(employee: Employee): string[];
}

export interface RankingLookup {
  mapGradeToRanking(grade: string | null, status: string): string | null;
}

export interface RosterParseOptions {
  mode?: ParseMode;
  validator?: EmployeeValidator;
  ranking?: RankingLookup;
  /** Number of leading rows searched for a header (default from config) */
  headerScanRows?: number;
  /** Reference point for "DOJ cannot be in the future" (defaults to now) */
  referenceDate?: Date;
}

export interface BatchError {
  identifier: string;
  error: string;
  timestamp: Date;
}

export interface Config {
  parsing: {
    headerScanRows: number;
  };
  ranking: {
    gradeToRanking: Record<string, string>;
  };
  validation: {
    allowedGenders: string[];
    allowedGrades: string[];
  };
  logging: {
    level: string;
  };
  cli: {
    maxErrorsShown: number;
  };
}
