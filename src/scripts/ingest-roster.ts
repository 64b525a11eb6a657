#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { basename } from 'path';
import { RosterParser } from '../parsers/roster-parser.js';
import { toEmployeeRecord } from '../core/employee-record.js';
import { getConfig } from '../utils/config.js';
import { ParsingError, handleError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';
import type { ParseMode } from '../types/index.js';

interface CliOptions {
  mode: ParseMode;
  out?: string;
  maxErrors?: number;
  failOnError?: boolean;
}

function parseMode(value: string): ParseMode {
  if (value !== 'header' && value !== 'template') {
    throw new InvalidArgumentError('Expected "header" or "template".');
  }
  return value;
}

function parseCount(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

const program = new Command();

program
  .name('ingest-roster')
  .description('Parse an employee roster workbook and report accepted rows and errors')
  .argument('<file>', 'Roster workbook (.xlsx, .xlsm, .xls)')
  .option('-m, --mode <mode>', 'Column detection: header (detect header row) or template (fixed order)', parseMode, 'header')
  .option('-o, --out <path>', 'Write accepted employees to this JSON file')
  .option('--max-errors <n>', 'Maximum number of errors to print', parseCount)
  .option('--fail-on-error', 'Exit with status 1 when any row is rejected')
  .action(async (file: string, opts: CliOptions) => {
    try {
      const config = getConfig();
      logger.level = config.logging.level === 'silent' ? 'error' : config.logging.level;
      logger.silent = config.logging.level === 'silent';

      const filename = basename(file);
      const parser = new RosterParser({ mode: opts.mode });
      if (!parser.canParseExtension(filename)) {
        throw new ParsingError(`Unsupported roster file type: ${filename}`, { filename });
      }

      logger.info('Starting roster ingestion', { file, mode: opts.mode });

      const buffer = await readFile(file);
      const result = parser.parse(buffer, filename);

      console.log('=== Roster Summary ===');
      console.log(`Accepted: ${result.employees.length}`);
      console.log(`Errors:   ${result.errors.length}`);

      if (result.errors.length > 0) {
        const maxErrors = opts.maxErrors ?? config.cli.maxErrorsShown;
        console.log('\nErrors:');
        for (const error of result.errors.slice(0, maxErrors)) {
          console.log(`  - ${error}`);
        }
        if (result.errors.length > maxErrors) {
          console.log(`  ... and ${result.errors.length - maxErrors} more`);
        }
      }

      if (opts.out) {
        const records = result.employees.map(toEmployeeRecord);
        await writeFile(opts.out, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
        console.log(`\nWrote ${records.length} employees to ${opts.out}`);
      }

      if (opts.failOnError && result.errors.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      const failure = handleError(error, file);
      console.error(`[FAILED] ${failure.identifier}: ${failure.error}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  handleError(error, 'ingest-roster');
  process.exit(1);
});
