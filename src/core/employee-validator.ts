import { z } from 'zod';
import { getConfig } from '../utils/config.js';
import type { Employee, EmployeeStatus, EmployeeValidator } from '../types/index.js';

const EMP_ID_PATTERN = /^[A-Za-z0-9/_-]+$/;

// Ranking derivation overwrites the grade for these statuses.
const GRADE_EXEMPT_STATUSES: ReadonlySet<EmployeeStatus> = new Set<EmployeeStatus>(['Under Training', 'Terminated']);

export interface EmployeeValidationRules {
  allowedGenders: string[];
  allowedGrades: string[];
}

function oneOf(allowed: string[]) {
  const values = new Set(allowed.map((value) => value.toLowerCase()));
  return (value: string | null) => value === null || values.has(value.toLowerCase());
}

function buildEmployeeSchema(rules: EmployeeValidationRules) {
  return z.object({
    empId: z.string().refine(
      (value) => EMP_ID_PATTERN.test(value),
      (value) => ({ message: `empId '${value}' contains invalid characters` })
    ),
    name: z.string().nullable().refine((value) => value !== null, { message: 'name is required' }),
    gender: z.string().nullable().refine(
      oneOf(rules.allowedGenders),
      (value) => ({ message: `gender '${value}' is not recognised` })
    ),
    grade: z.string().nullable().refine(
      oneOf(rules.allowedGrades),
      (value) => ({ message: `grade '${value}' is not recognised` })
    ),
  });
}

/**
 * Default field-level validation for parsed employees.
 * Reference lists come from the `validation` section of config.
 */
export class SchemaEmployeeValidator implements EmployeeValidator {
  private readonly schema: ReturnType<typeof buildEmployeeSchema>;

  constructor(rules: EmployeeValidationRules = getConfig().validation) {
    this.schema = buildEmployeeSchema(rules);
  }

  validate(employee: Employee): string[] {
    const subject = GRADE_EXEMPT_STATUSES.has(employee.status) ? { ...employee, grade: null } : employee;
    const result = this.schema.safeParse(subject);
    const messages = result.success ? [] : result.error.issues.map((issue) => issue.message);

    // Trainees are not assigned to a business unit yet
    if (employee.status !== 'Under Training' && !employee.bu) {
      messages.push('bu is required');
    }
    return messages;
  }
}
