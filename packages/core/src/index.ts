/**
 * @spendbook/core - Domain logic for the expense tracker
 *
 * Ledger aggregation, flat-file persistence, reports and the service that
 * ties them together. Pure and synchronous; the terminal UI lives in apps/cli.
 */

export * from './ledger/index.js';
export * from './persistence/index.js';
export * from './reports/index.js';
export * from './expenses/index.js';
export { loadTrackerConfig, ConfigError } from './config.js';
export type { TrackerConfig } from './config.js';
