/**
 * Environment-driven configuration. Values are validated once; the CLI loads
 * `.env` before anything reads them.
 */
import { z } from 'zod';
import {
  DEFAULT_BALANCE_TOLERANCE,
  DEFAULT_MAX_PAGES,
  DEFAULT_MIN_RECONCILED_ROWS,
} from './utils/constants.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const envBool = z
  .enum(['true', 'false', '1', '0', ''])
  .transform((value) => value === 'true' || value === '1');

const ConfigSchema = z.object({
  STATEMENT_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STATEMENT_MAX_PAGES: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
  STATEMENT_BALANCE_TOLERANCE: z.coerce.number().nonnegative().default(DEFAULT_BALANCE_TOLERANCE),
  STATEMENT_MIN_RECONCILED_ROWS: z.coerce.number().int().positive().default(DEFAULT_MIN_RECONCILED_ROWS),
  STATEMENT_AUTODETECT: envBool.default('true'),
});

export interface Config {
  logLevel: LogLevel;
  maxPages: number;
  balanceTolerance: number;
  minReconciledRows: number;
  autoDetect: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const present: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') present[key] = value.trim();
  }

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    logLevel: parsed.data.STATEMENT_LOG_LEVEL,
    maxPages: parsed.data.STATEMENT_MAX_PAGES,
    balanceTolerance: parsed.data.STATEMENT_BALANCE_TOLERANCE,
    minReconciledRows: parsed.data.STATEMENT_MIN_RECONCILED_ROWS,
    autoDetect: parsed.data.STATEMENT_AUTODETECT,
  };
}

let cached: Config | null = null;

export function getConfig(): Config {
  if (cached === null) {
    cached = loadConfig();
  }
  return cached;
}
