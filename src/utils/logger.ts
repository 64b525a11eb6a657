import winston from 'winston';
import { join } from 'path';

const { combine, timestamp, json, printf, colorize } = winston.format;

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly', 'silent'] as const;
type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(value: string | undefined): LogLevel {
  return value && isLogLevel(value) ? value : 'info';
}

const logLevel = resolveLevel(process.env.LOG_LEVEL);
const logDir = process.env.LOG_DIR || 'logs';

// LOG_FORMAT=pretty for a coloured one-line-per-event console
const consoleFormat = process.env.LOG_FORMAT === 'pretty'
  ? combine(
      colorize(),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      printf(({ level, message, timestamp, module, ...meta }) => {
        const scope = typeof module === 'string' ? ` (${module})` : '';
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} [${level}]${scope}: ${message}${metaStr}`;
      })
    )
  : combine(timestamp(), json());

export const logger = winston.createLogger({
  level: logLevel === 'silent' ? 'error' : logLevel,
  silent: logLevel === 'silent',
  format: combine(timestamp(), json()),
  defaultMeta: { service: 'roster-ingest' },
  transports: [
    // stderr keeps stdout free for the CLI summary
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: LEVELS.filter((level) => level !== 'silent'),
    }),
  ],
});

if (process.env.NODE_ENV === 'production') {
  logger.add(new winston.transports.File({ filename: join(logDir, 'roster-errors.log'), level: 'error' }));
  logger.add(new winston.transports.File({ filename: join(logDir, 'roster.log') }));
}

export interface LogContext {
  module: string;
  [key: string]: unknown;
}

export function createChildLogger(context: LogContext): winston.Logger {
  return logger.child(context);
}
