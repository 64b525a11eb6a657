import { POSITIONAL_COLUMN_MAP } from '../src/parsers/header-mapper';
import { parseRow, parseTemplateRow } from '../src/parsers/row-parser';
import type { Cell } from '../src/parsers/cell-normalizer';
import type { RowOutcome, RowParserContext, SheetRow } from '../src/parsers/row-parser';
import type { CanonicalField, Employee } from '../src/types';

type RowValues = Partial<Record<CanonicalField, string | Cell>>;

const FIELDS: CanonicalField[] = [
  'empid', 'name', 'gender', 'doj', 'nsbt batchno', 'status',
  'grade', 'bu', 'mpr no', 'io name', 'released date', 'resiznation date',
];

function templateRow(values: RowValues, rowNumber = 2): SheetRow {
  const cells: Array<Cell | null> = new Array(FIELDS.length).fill(null);
  for (const field of FIELDS) {
    const index = POSITIONAL_COLUMN_MAP[field];
    const value = values[field];
    if (index === undefined || value === undefined) continue;
    cells[index] = typeof value === 'string' ? { kind: 'text', text: value } : value;
  }
  return { rowNumber, cells };
}

const VALID: RowValues = {
  'empid': 'E100',
  'name': 'Asha Rao',
  'gender': 'Female',
  'doj': '2024-01-10',
  'nsbt batchno': 'NB-12',
  'status': 'Allocated',
  'grade': 'B',
  'bu': 'Delivery',
  'mpr no': 'MPR-9',
  'io name': 'R. Iyer',
};

function context(validate: (employee: Employee) => string[] = () => []): RowParserContext {
  return {
    validator: { validate },
    ranking: { mapGradeToRanking: (grade) => (grade ? `R-${grade}` : null) },
    referenceDate: new Date(2025, 9, 19),
  };
}

function parse(values: RowValues, ctx: RowParserContext = context(), rowNumber = 2): RowOutcome {
  return parseRow(templateRow(values, rowNumber), POSITIONAL_COLUMN_MAP, ctx);
}

function errorOf(outcome: RowOutcome): string | undefined {
  return outcome.ok ? undefined : outcome.error;
}

function employeeOf(outcome: RowOutcome): Employee | undefined {
  return outcome.ok ? outcome.employee : undefined;
}

describe('parseRow', () => {
  it('builds a complete employee from a valid row', () => {
    const employee = employeeOf(parse({ ...VALID, 'resiznation date': '15-Mar-2025' }));
    expect(employee).toEqual({
      empId: 'E100',
      name: 'Asha Rao',
      gender: 'Female',
      nsbtBatchNo: 'NB-12',
      status: 'Allocated',
      grade: 'B',
      bu: 'Delivery',
      mprNo: 'MPR-9',
      ioName: 'R. Iyer',
      ranking: 'R-B',
      doj: { year: 2024, month: 1, day: 10 },
      resignationDate: { year: 2025, month: 3, day: 15 },
      releasedDate: null,
    });
  });

  it('rejects an empty or whitespace-only empid', () => {
    expect(errorOf(parse({ ...VALID, empid: '   ' }))).toBe('Row 2: empid is empty');
    expect(errorOf(parse({ ...VALID, empid: undefined }))).toBe('Row 2: empid is empty');
  });

  it('uses the sheet row number in errors', () => {
    expect(errorOf(parse({ ...VALID, empid: '' }, context(), 17))).toBe('Row 17: empid is empty');
  });

  it('requires an exact status from the allowed set', () => {
    expect(errorOf(parse({ ...VALID, status: 'allocated' }))).toBe("Row 2: invalid status 'allocated'");
    expect(errorOf(parse({ ...VALID, status: undefined }))).toBe("Row 2: invalid status ''");
  });

  it('accepts a status with stray whitespace', () => {
    expect(employeeOf(parse({ ...VALID, status: ' Resigned ' }))?.status).toBe('Resigned');
  });

  it('stops at the first failing check', () => {
    expect(errorOf(parse({ ...VALID, status: 'Active', doj: 'not a date' }))).toBe("Row 2: invalid status 'Active'");
  });

  it('reports unparseable dates', () => {
    expect(errorOf(parse({ ...VALID, 'released date': 'soon' }))).toBe(
      "Row 2: invalid date format - Text 'soon' could not be parsed as a supported date format"
    );
  });

  it('requires a date of joining', () => {
    expect(errorOf(parse({ ...VALID, doj: undefined }))).toBe('Row 2: DOJ is required');
  });

  it('rejects a date of joining after the reference date', () => {
    expect(errorOf(parse({ ...VALID, doj: '2025-10-20' }))).toBe('Row 2: DOJ cannot be in the future');
    expect(employeeOf(parse({ ...VALID, doj: '2025-10-19' }))?.doj).toEqual({ year: 2025, month: 10, day: 19 });
  });

  it('reads a two-digit DOJ year in the 2000s', () => {
    expect(errorOf(parse({ ...VALID, doj: '15-Mar-80' }))).toBe('Row 2: DOJ cannot be in the future');
    expect(employeeOf(parse({ ...VALID, doj: '15-Mar-24' }))?.doj).toEqual({ year: 2024, month: 3, day: 15 });
  });

  it('rejects a resignation date before the date of joining', () => {
    const outcome = parse({ ...VALID, 'doj': '2024-01-10', 'resiznation date': '2024-01-05' });
    expect(errorOf(outcome)).toBe('Row 2: Resignation date cannot be before DOJ');
  });

  it('rejects a release date before the date of joining', () => {
    const outcome = parse({ ...VALID, 'doj': '2024-01-10', 'released date': '09-01-2024' });
    expect(errorOf(outcome)).toBe('Row 2: Release date cannot be before DOJ');
  });

  it('takes date cells without text parsing', () => {
    const doj: Cell = { kind: 'date', date: { year: 2023, month: 7, day: 3 } };
    expect(employeeOf(parse({ ...VALID, doj }))?.doj).toEqual({ year: 2023, month: 7, day: 3 });
  });

  it('collapses integral numeric ids', () => {
    const empid: Cell = { kind: 'number', value: 12345, display: '12345.0' };
    expect(employeeOf(parse({ ...VALID, empid }))?.empId).toBe('12345');
  });

  it('joins validation failures and appends the parsed identifiers', () => {
    const outcome = parse(
      { ...VALID, 'bu': undefined, 'io name': undefined },
      context(() => ['name is required', 'bu is required'])
    );
    expect(errorOf(outcome)).toBe(
      'Row 2: name is required, bu is required [parsed: EMPID=E100, IO_NAME=null, BU=null, MPR_NO=MPR-9]'
    );
  });

  it('validates the employee before ranking is applied', () => {
    const seen: Employee[] = [];
    const employee = employeeOf(parse(VALID, context((e) => {
      seen.push({ ...e });
      return [];
    })));

    expect(seen).toHaveLength(1);
    expect(seen[0]?.ranking).toBeNull();
    expect(employee?.ranking).toBe('R-B');
  });

  it('clears grade and ranking for trainees', () => {
    const employee = employeeOf(parse({ ...VALID, status: 'Under Training', grade: 'A' }));
    expect(employee?.grade).toBeNull();
    expect(employee?.ranking).toBeNull();
  });

  it('pins terminated employees to D and NI', () => {
    const employee = employeeOf(parse({ ...VALID, status: 'Terminated', grade: 'A' }));
    expect(employee?.grade).toBe('D');
    expect(employee?.ranking).toBe('NI');
  });

  it('stores missing optional fields as null', () => {
    const employee = employeeOf(parse({ ...VALID, 'gender': ' ', 'mpr no': undefined }));
    expect(employee?.gender).toBeNull();
    expect(employee?.mprNo).toBeNull();
  });
});

describe('parseTemplateRow', () => {
  it('matches status ignoring case and applies ranking', () => {
    const employee = employeeOf(
      parseTemplateRow(templateRow({ ...VALID, status: 'terminated', grade: 'B' }), context())
    );
    expect(employee?.status).toBe('Terminated');
    expect(employee?.grade).toBe('D');
    expect(employee?.ranking).toBe('NI');
  });

  it('does not check date order or call the validator', () => {
    const validate = jest.fn(() => ['never']);
    const outcome = parseTemplateRow(
      templateRow({ ...VALID, 'doj': '2024-01-10', 'resiznation date': '2024-01-05' }),
      context(validate)
    );
    expect(employeeOf(outcome)?.resignationDate).toEqual({ year: 2024, month: 1, day: 5 });
    expect(validate).not.toHaveBeenCalled();
  });

  it('reports date errors with the parser message', () => {
    const outcome = parseTemplateRow(templateRow({ ...VALID, doj: 'tomorrow' }, 5), context());
    expect(errorOf(outcome)).toBe("Row 5: Text 'tomorrow' could not be parsed as a supported date format");
  });
});
