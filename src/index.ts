/**
 * Employee roster ingestion
 *
 * Main entry point for programmatic usage.
 * For CLI usage, see src/scripts/ingest-roster.ts
 */

// Parser exports
export * from './parsers/index.js';

// Collaborators
export { ConfigRankingLookup, applyRanking } from './core/ranking.js';
export { SchemaEmployeeValidator } from './core/employee-validator.js';
export type { EmployeeValidationRules } from './core/employee-validator.js';
export { toEmployeeRecord } from './core/employee-record.js';
export type { EmployeeRecord } from './core/employee-record.js';

// Utility exports
export { logger, createChildLogger } from './utils/logger.js';
export { loadConfig, getConfig } from './utils/config.js';
export {
  RosterIngestionError,
  ParsingError,
  DateFormatError,
  ConfigurationError,
  handleError,
  getErrorMessage,
} from './utils/error-handler.js';

// Type exports
export { EMPLOYEE_STATUSES } from './types/index.js';
export type {
  Employee,
  EmployeeStatus,
  CalendarDate,
  RosterParseResult,
  RosterParseOptions,
  CanonicalField,
  ColumnMap,
  ParseMode,
  EmployeeValidator,
  RankingLookup,
  BatchError,
  Config,
} from './types/index.js';
