import { normalizeText } from './cell-normalizer.js';
import type { CanonicalField, ColumnMap } from '../types/index.js';

export const REQUIRED_HEADER_FIELDS: readonly CanonicalField[] = ['empid', 'name', 'status', 'doj'];

/**
 * Column order of the roster upload template, used when no header row is found.
 */
export const POSITIONAL_COLUMN_MAP: Readonly<ColumnMap> = Object.freeze({
  'empid': 0,
  'name': 1,
  'gender': 2,
  'doj': 3,
  'nsbt batchno': 4,
  'status': 5,
  'grade': 6,
  'bu': 7,
  'mpr no': 8,
  'io name': 9,
  'released date': 10,
  'resiznation date': 11,
});

interface HeaderRule {
  field: CanonicalField;
  matches: (key: string) => boolean;
}

const containsAny = (...needles: string[]) => (key: string) => needles.some((n) => key.includes(n));

// Every rule is checked against every header; a header may feed several fields.
const HEADER_RULES: readonly HeaderRule[] = [
  { field: 'empid', matches: containsAny('empid', 'employeeid') },
  { field: 'name', matches: (k) => k === 'name' || k.includes('employeename') },
  { field: 'gender', matches: (k) => k.includes('gender') || k === 'sex' },
  { field: 'doj', matches: containsAny('doj', 'dateofjoin', 'dateofjoining') },
  { field: 'resiznation date', matches: containsAny('resign', 'resiz', 'leavingdate', 'resignationdate') },
  { field: 'released date', matches: containsAny('released', 'releasedate', 'releasedon') },
  { field: 'nsbt batchno', matches: (k) => (k.includes('nsbt') || k.includes('batch')) && k.includes('no') },
  { field: 'status', matches: containsAny('status', 'employeestatus') },
  { field: 'grade', matches: containsAny('grade', 'employeegrade') },
  { field: 'bu', matches: (k) => k === 'bu' || k.includes('businessunit') },
  { field: 'mpr no', matches: containsAny('mpr', 'projectno') },
  { field: 'io name', matches: containsAny('immediateofficer', 'supervisor') },
];

// A bare "io" inside another field's header ("resignationdate") is not an IO column.
const matchesBareIo = (key: string) => key.includes('io');

/**
 * Reduce a header label to lowercase letters and digits,
 * e.g. "Emp ID" -> "empid", "Date of Joining" -> "dateofjoining".
 */
export function compactHeaderKey(label: string): string | null {
  const normalized = normalizeText(label);
  if (!normalized) return null;
  return normalized.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Map header labels (indexed by column) to canonical fields.
 * Sparse arrays and null entries are allowed for missing header cells.
 */
export function mapHeaderRow(labels: ReadonlyArray<string | null | undefined>): ColumnMap {
  const columns: ColumnMap = {};

  labels.forEach((label, columnIndex) => {
    if (label == null) return;
    const key = compactHeaderKey(label);
    if (!key) return;

    let matched = false;
    for (const rule of HEADER_RULES) {
      if (rule.matches(key)) {
        columns[rule.field] = columnIndex;
        matched = true;
      }
    }
    if (!matched && matchesBareIo(key)) {
      columns['io name'] = columnIndex;
    }
  });

  return columns;
}

export function isUsableHeader(columns: ColumnMap): boolean {
  return REQUIRED_HEADER_FIELDS.every((field) => columns[field] !== undefined);
}
