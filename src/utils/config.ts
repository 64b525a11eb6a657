import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from './error-handler.js';
import type { Config } from '../types/index.js';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly', 'silent']);

const HeaderScanRowsSchema = z.number().int().positive();
const MaxErrorsShownSchema = z.number().int().nonnegative();

const ConfigSchema = z.object({
  parsing: z.object({
    headerScanRows: HeaderScanRowsSchema,
  }),
  ranking: z.object({
    gradeToRanking: z.record(z.string()),
  }),
  validation: z.object({
    allowedGenders: z.array(z.string()),
    allowedGrades: z.array(z.string()),
  }),
  logging: z.object({
    level: LogLevelSchema,
  }),
  cli: z.object({
    maxErrorsShown: MaxErrorsShownSchema,
  }),
});

let config: Config | null = null;

/**
 * Read an integer override, held to the same rule as the config file field.
 */
function readIntEnv(name: string, schema: z.ZodNumber): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got '${raw}'`, { name, raw });
  }
  const checked = schema.safeParse(value);
  if (!checked.success) {
    throw new ConfigurationError(`${name} has an invalid value '${raw}'`, {
      name,
      raw,
      issues: checked.error.issues.map((issue) => issue.message),
    });
  }
  return checked.data;
}

export function loadConfig(): Config {
  if (config) return config;

  // Same relative location from src/utils and dist/utils
  const configPath = join(__dirname, '../..', 'config', 'default.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${configPath}: ${getErrorMessage(error)}`, { configPath });
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config in ${configPath}: ${parsed.error.message}`, {
      configPath,
      issues: parsed.error.format(),
    });
  }

  const loaded: Config = parsed.data;

  // Apply environment variable overrides
  const headerScanRows = readIntEnv('ROSTER_HEADER_SCAN_ROWS', HeaderScanRowsSchema);
  if (headerScanRows !== undefined) {
    loaded.parsing.headerScanRows = headerScanRows;
  }
  const maxErrorsShown = readIntEnv('ROSTER_MAX_ERRORS_SHOWN', MaxErrorsShownSchema);
  if (maxErrorsShown !== undefined) {
    loaded.cli.maxErrorsShown = maxErrorsShown;
  }
  const logLevel = process.env.LOG_LEVEL;
  if (logLevel) {
    const level = LogLevelSchema.safeParse(logLevel);
    if (!level.success) {
      throw new ConfigurationError(`LOG_LEVEL '${logLevel}' is not a known level`, { logLevel });
    }
    loaded.logging.level = level.data;
  }

  config = loaded;
  return config;
}

export function getConfig(): Config {
  return loadConfig();
}
