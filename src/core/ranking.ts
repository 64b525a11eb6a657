import { getConfig } from '../utils/config.js';
import type { Employee, RankingLookup } from '../types/index.js';

/**
 * Grade-to-ranking lookup backed by `ranking.gradeToRanking` in config.
 * Grades are matched trimmed and case-insensitively; unknown grades give null.
 */
export class ConfigRankingLookup implements RankingLookup {
  private readonly table: Map<string, string>;

  constructor(gradeToRanking: Record<string, string> = getConfig().ranking.gradeToRanking) {
    this.table = new Map(
      Object.entries(gradeToRanking).map(([grade, ranking]) => [grade.trim().toUpperCase(), ranking])
    );
  }

  mapGradeToRanking(grade: string | null, _status: string): string | null {
    if (!grade) return null;
    return this.table.get(grade.trim().toUpperCase()) ?? null;
  }
}

/**
 * Set grade and ranking from status. Exactly one branch applies:
 * trainees carry neither, terminated staff are pinned to D/NI, everyone
 * else gets the lookup's ranking for their grade.
 */
export function applyRanking(employee: Employee, lookup: RankingLookup): Employee {
  switch (employee.status) {
    case 'Under Training':
      employee.grade = null;
      employee.ranking = null;
      break;
    case 'Terminated':
      employee.grade = 'D';
      employee.ranking = 'NI';
      break;
    default:
      employee.ranking = lookup.mapGradeToRanking(employee.grade, employee.status);
  }
  return employee;
}
