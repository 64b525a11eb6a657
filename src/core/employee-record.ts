import { formatCalendarDate } from '../parsers/date-parser.js';
import type { CalendarDate, Employee, EmployeeStatus } from '../types/index.js';

/**
 * Storage shape of an employee: snake_case columns, ISO (yyyy-MM-dd) dates.
 */
export interface EmployeeRecord {
  emp_id: string;
  name: string | null;
  gender: string | null;
  nsbt_batch_no: string | null;
  status: EmployeeStatus;
  grade: string | null;
  bu: string | null;
  mpr_no: string | null;
  io_name: string | null;
  ranking: string | null;
  doj: string;
  resignation_date: string | null;
  released_date: string | null;
}

function isoOrNull(date: CalendarDate | null): string | null {
  return date ? formatCalendarDate(date, 'yyyy-MM-dd') : null;
}

export function toEmployeeRecord(employee: Employee): EmployeeRecord {
  return {
    emp_id: employee.empId,
    name: employee.name,
    gender: employee.gender,
    nsbt_batch_no: employee.nsbtBatchNo,
    status: employee.status,
    grade: employee.grade,
    bu: employee.bu,
    mpr_no: employee.mprNo,
    io_name: employee.ioName,
    ranking: employee.ranking,
    doj: formatCalendarDate(employee.doj, 'yyyy-MM-dd'),
    resignation_date: isoOrNull(employee.resignationDate),
    released_date: isoOrNull(employee.releasedDate),
  };
}
