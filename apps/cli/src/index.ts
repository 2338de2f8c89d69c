#!/usr/bin/env tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { convert, listBanks } from '@statement-kit/converter';
import { PARSER_VERSION, type DisplayDateFormat } from '@statement-kit/types';
import { scanDirectoryForStatements, validateDirectory } from './directory-scanner.js';
import {
  OUTPUT_FORMATS,
  describeFailure,
  isDisplayDateFormat,
  isOutputFormat,
  renderResult,
  summarizeResult,
  type OutputFormat,
} from './render.js';

interface CliOptions {
  bank?: string;
  password?: string;
  out?: string;
  format: string;
  dateFormat: string;
  inputDir?: string;
  verbose: boolean;
}

interface RunSettings {
  bank: string;
  password: string | undefined;
  format: OutputFormat;
  dateFormat: DisplayDateFormat;
  verbose: boolean;
}

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

const program = new Command();

program
  .name('statement-kit')
  .description('Convert UAE bank statements (PDF, XLSX, CSV) into the six-column transaction table')
  .version(PARSER_VERSION)
  .argument('[file]', 'Statement file to convert')
  .option('-b, --bank <id>', 'Bank identifier (see the "banks" command)', process.env['STATEMENT_BANK'])
  .option('-p, --password <password>', 'Password of an encrypted statement', process.env['STATEMENT_PASSWORD'])
  .option('-o, --out <path>', 'Output file, or output directory with --input-dir (default: stdout)', process.env['STATEMENT_OUTPUT'])
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, process.env['STATEMENT_FORMAT'] ?? 'csv')
  .option('--date-format <format>', 'Date column: dmy (DD-MM-YYYY) or iso', process.env['STATEMENT_DATE_FORMAT'] ?? 'dmy')
  .option('-d, --input-dir <directory>', 'Convert every statement file in a directory', process.env['STATEMENT_INPUT_DIR'])
  .option('-v, --verbose', 'Enable verbose output', envBool('STATEMENT_VERBOSE', false))
  .action(async (file: string | undefined, options: CliOptions) => {
    try {
      const settings = resolveSettings(options);
      if (options.inputDir !== undefined) {
        await processDirectory(options.inputDir, options.out, settings);
      } else if (file !== undefined) {
        await processSingleFile(file, options.out, settings);
      } else {
        console.error('[ERROR] Either a statement file or --input-dir must be specified');
        process.exit(1);
      }
    } catch (error) {
      for (const line of describeFailure(error)) console.error(line);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program
  .command('banks')
  .description('List supported bank identifiers')
  .action(() => {
    for (const profile of listBanks()) {
      const kinds = profile.documentKinds.join('/');
      const password = profile.passwordSupport ? ', password' : '';
      console.log(`${profile.id.padEnd(22)}${profile.displayName} (${kinds}, ${profile.strategy}${password})`);
    }
  });

function resolveSettings(options: CliOptions): RunSettings {
  if (options.bank === undefined || options.bank === '') {
    throw new Error('--bank is required (run "statement-kit banks" for the list)');
  }
  if (!isOutputFormat(options.format)) {
    throw new Error(`Unknown format "${options.format}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  if (!isDisplayDateFormat(options.dateFormat)) {
    throw new Error(`Unknown date format "${options.dateFormat}". Use dmy or iso`);
  }
  return {
    bank: options.bank,
    password: options.password === '' ? undefined : options.password,
    format: options.format,
    dateFormat: options.dateFormat,
    verbose: options.verbose,
  };
}

async function processSingleFile(file: string, out: string | undefined, settings: RunSettings): Promise<void> {
  const filePath = resolve(file);
  if (settings.verbose) {
    console.error(`[INFO] Converting ${filePath} as ${settings.bank}`);
  }

  const bytes = await readFile(filePath);
  const result = await convert(settings.bank, bytes, settings.password);
  const rendered = renderResult(result, settings.format, {
    dateFormat: settings.dateFormat,
    fileName: basename(filePath),
  });

  if (out === undefined) {
    process.stdout.write(rendered);
  } else {
    const outPath = resolve(out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, rendered);
    console.error(`[INFO] Written to ${outPath}`);
  }

  for (const line of summarizeResult(result, basename(filePath))) console.error(line);
}

async function processDirectory(inputDir: string, out: string | undefined, settings: RunSettings): Promise<void> {
  const dirPath = resolve(inputDir);
  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    throw new Error(validation.error ?? `Cannot access directory: ${dirPath}`);
  }

  const scan = await scanDirectoryForStatements(dirPath);
  if (scan.files.length === 0) {
    throw new Error('No statement files (.pdf, .xlsx, .xls, .csv) found in directory');
  }
  if (settings.verbose) {
    for (const skip of scan.skipped) console.error(`[INFO] Skipped ${skip.fileName}: ${skip.reason}`);
  }

  const outDir = resolve(out ?? dirPath);
  await mkdir(outDir, { recursive: true });

  const failures: Array<{ fileName: string; lines: string[] }> = [];
  let transactions = 0;

  for (const [index, info] of scan.files.entries()) {
    console.error(`[INFO] Converting ${index + 1}/${scan.files.length}: ${info.fileName}`);
    try {
      const result = await convert(settings.bank, await readFile(info.filePath), settings.password);
      const target = join(outDir, `${basename(info.fileName, extname(info.fileName))}.${settings.format}`);
      await writeFile(
        target,
        renderResult(result, settings.format, { dateFormat: settings.dateFormat, fileName: info.fileName })
      );
      transactions += result.transactions.length;
      for (const line of summarizeResult(result, info.fileName)) console.error(line);
    } catch (error) {
      const lines = describeFailure(error);
      failures.push({ fileName: info.fileName, lines });
      for (const line of lines) console.error(line);
    }
  }

  console.error('');
  console.error('=== Batch Summary ===');
  console.error(`Files found:        ${scan.files.length}`);
  console.error(`Files converted:    ${scan.files.length - failures.length}`);
  console.error(`Files failed:       ${failures.length}`);
  console.error(`Transactions:       ${transactions}`);
  console.error('=====================');

  if (failures.length > 0) {
    for (const failure of failures) {
      console.error(`  - ${failure.fileName}: ${failure.lines[0]?.replace('[ERROR] ', '') ?? 'failed'}`);
    }
    process.exit(1);
  }
}

program.parseAsync().catch((error: unknown) => {
  for (const line of describeFailure(error)) console.error(line);
  process.exit(1);
});
