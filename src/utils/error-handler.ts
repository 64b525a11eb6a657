import { logger } from './logger.js';
import type { BatchError } from '../types/index.js';

export class RosterIngestionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RosterIngestionError';
  }
}

export class ParsingError extends RosterIngestionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PARSING_ERROR', context);
    this.name = 'ParsingError';
  }
}

/**
 * Raised when a cell value matches none of the accepted date patterns.
 * `input` is the text as it was read, before any cleanup.
 */
export class DateFormatError extends RosterIngestionError {
  constructor(public readonly input: string) {
    super(`Text '${input}' could not be parsed as a supported date format`, 'DATE_FORMAT_ERROR', { input });
    this.name = 'DateFormatError';
  }
}

export class ConfigurationError extends RosterIngestionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function handleError(error: unknown, identifier?: string): BatchError {
  const errorMessage = getErrorMessage(error);
  const errorDetails = error instanceof RosterIngestionError ? error.context : undefined;

  logger.error('Roster processing failed', {
    identifier,
    error: errorMessage,
    details: errorDetails,
  });

  return {
    identifier: identifier || 'unknown',
    error: errorMessage,
    timestamp: new Date(),
  };
}
