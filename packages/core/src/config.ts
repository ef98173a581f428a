import { z } from 'zod';
import { DEFAULT_META_SUFFIX } from './persistence/file-ledger-repository.js';
import { DEFAULT_REPORT_FILE } from './reports/report-exporter.js';

const DEFAULT_DATA_FILE = 'expenses.txt';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type TrackerConfig = {
  dataFile: string;
  metaSuffix: string;
  reportFile: string;
  totalsSource: 'records' | 'metadata';
  resetClearsBudgets: boolean;
  logLevel: (typeof LOG_LEVELS)[number];
  logFile: string | undefined;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const BooleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const TrackerEnvSchema = z.object({
  EXPENSES_FILE: z.string().trim().min(1).default(DEFAULT_DATA_FILE),
  EXPENSES_META_SUFFIX: z.string().trim().min(1).default(DEFAULT_META_SUFFIX),
  EXPENSES_REPORT_FILE: z.string().trim().min(1).default(DEFAULT_REPORT_FILE),
  EXPENSES_TOTALS_SOURCE: z.enum(['records', 'metadata']).default('records'),
  EXPENSES_RESET_CLEARS_BUDGETS: BooleanFlagSchema.default('false'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  LOG_FILE: z.string().trim().min(1).optional(),
});

/**
 * Read tracker settings from the environment.
 * Blank variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadTrackerConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const present = Object.fromEntries(
    Object.keys(TrackerEnvSchema.shape)
      .map((key) => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = TrackerEnvSchema.safeParse(present);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigError(`Invalid configuration: ${errors}`);
  }

  const parsed = result.data;
  return {
    dataFile: parsed.EXPENSES_FILE,
    metaSuffix: parsed.EXPENSES_META_SUFFIX,
    reportFile: parsed.EXPENSES_REPORT_FILE,
    totalsSource: parsed.EXPENSES_TOTALS_SOURCE,
    resetClearsBudgets: parsed.EXPENSES_RESET_CLEARS_BUDGETS,
    logLevel: parsed.LOG_LEVEL,
    logFile: parsed.LOG_FILE,
  };
}
