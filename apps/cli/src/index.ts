#!/usr/bin/env tsx
/**
 * Spendbook terminal entry point
 *
 * Loads .env, builds the logger, repository and service from configuration,
 * then runs the menu session until the user exits or stdin closes.
 */

import dotenv from 'dotenv';
import {
  ConfigError,
  ExpenseService,
  FileLedgerRepository,
  loadTrackerConfig,
} from '@spendbook/core';
import type { TrackerConfig } from '@spendbook/core';
import { createLogDestination, createLogger } from '@spendbook/observability';
import { TrackerSession } from './session.js';
import { TerminalIO } from './terminal-io.js';

dotenv.config();

async function main(): Promise<number> {
  let config: TrackerConfig;
  try {
    config = loadTrackerConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  const logger = createLogger(
    { level: config.logLevel },
    createLogDestination({ file: config.logFile })
  );

  const repository = new FileLedgerRepository({
    filePath: config.dataFile,
    metaSuffix: config.metaSuffix,
    totalsSource: config.totalsSource,
    ledgerOptions: { resetClearsBudgets: config.resetClearsBudgets },
    logger,
  });

  const { service, loadError } = ExpenseService.open({ repository, logger });

  const io = new TerminalIO();
  if (loadError === null && service.ledger.history().length === 0) {
    io.print('No previous data found. Starting fresh.');
  }

  try {
    await new TrackerSession({ service, io, reportFile: config.reportFile }).run();
  } finally {
    io.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  }
);
