/**
 * File Ledger Repository
 *
 * Flat-file persistence for the ledger:
 * - record file: CSV with a date,category,amount,description header
 * - metadata file: JSON sidecar (record file path + suffix) with totals and budgets
 */

import { readFileSync } from 'node:fs';
import {
  ExpenseRecordSchema,
  LedgerMetadataSchema,
  RECORD_FILE_HEADER,
} from '@spendbook/types';
import type { LedgerMetadata } from '@spendbook/types';
import type { Logger } from '@spendbook/observability';
import { Ledger } from '../ledger/ledger.js';
import type { LedgerOptions } from '../ledger/ledger-types.js';
import { writeFileAtomicSync } from './atomic-write.js';
import { parseCsv, serializeCsv } from './csv.js';
import type { LedgerRepository, TotalsSource } from './ledger-repository.js';
import { PersistenceError, isErrnoException } from './persistence-errors.js';

export const DEFAULT_META_SUFFIX = '.meta';

export interface FileLedgerRepositoryOptions {
  filePath: string;
  logger: Logger;
  metaSuffix?: string;
  totalsSource?: TotalsSource;
  /**
   * Passed to every Ledger this repository builds
   */
  ledgerOptions?: LedgerOptions;
}

export class FileLedgerRepository implements LedgerRepository {
  readonly filePath: string;
  readonly metaPath: string;
  private readonly totalsSource: TotalsSource;
  private readonly ledgerOptions: LedgerOptions;
  private readonly logger: Logger;

  constructor(options: FileLedgerRepositoryOptions) {
    this.filePath = options.filePath;
    this.metaPath = options.filePath + (options.metaSuffix ?? DEFAULT_META_SUFFIX);
    this.totalsSource = options.totalsSource ?? 'records';
    this.ledgerOptions = options.ledgerOptions ?? {};
    this.logger = options.logger;
  }

  create(): Ledger {
    return new Ledger(this.ledgerOptions);
  }

  /**
   * Load the ledger from disk
   *
   * Totals are recomputed from the records. With totalsSource 'metadata'
   * the stored snapshot then replaces them; the two are never added together.
   *
   * @throws PersistenceError if a file exists but cannot be read
   */
  load(): Ledger {
    const ledger = this.create();

    const recordText = this.readIfExists(this.filePath);
    if (recordText === null) {
      this.logger.info({ file: this.filePath }, 'No record file found, starting fresh');
    } else {
      this.hydrateRecords(ledger, recordText);
    }

    const metaText = this.readIfExists(this.metaPath);
    if (metaText !== null) {
      this.applyMetadata(ledger, metaText);
    }

    return ledger;
  }

  /**
   * Write the record table and the metadata snapshot
   *
   * @throws PersistenceError if either artifact cannot be written
   */
  save(ledger: Ledger): void {
    const snapshot = ledger.snapshot();

    const rows = [
      RECORD_FILE_HEADER,
      ...snapshot.history.map((record) => [
        record.date,
        record.category,
        String(record.amount),
        record.description,
      ]),
    ];
    writeFileAtomicSync(this.filePath, serializeCsv(rows));

    const metadata: LedgerMetadata = {
      expenses: snapshot.totals,
      budgets: snapshot.budgets,
    };
    writeFileAtomicSync(this.metaPath, JSON.stringify(metadata, null, 2) + '\n');

    this.logger.debug(
      { file: this.filePath, records: snapshot.history.length },
      'Ledger saved'
    );
  }

  private hydrateRecords(ledger: Ledger, text: string): void {
    const rows = parseCsv(text);
    const [first] = rows;
    const hasHeader =
      first !== undefined &&
      first.length === RECORD_FILE_HEADER.length &&
      first.every((cell, index) => cell.trim().toLowerCase() === RECORD_FILE_HEADER[index]);

    let skipped = 0;
    for (const row of hasHeader ? rows.slice(1) : rows) {
      if (row.length !== RECORD_FILE_HEADER.length) {
        skipped++;
        continue;
      }

      const [date, category, amount, description] = row;
      const parsed = ExpenseRecordSchema.safeParse({ date, category, amount, description });
      if (!parsed.success) {
        skipped++;
        continue;
      }

      ledger.appendRecord(parsed.data);
    }

    if (skipped > 0) {
      this.logger.warn({ file: this.filePath, skipped }, 'Skipped malformed rows');
    }
  }

  private applyMetadata(ledger: Ledger, text: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logger.warn({ file: this.metaPath, err: error }, 'Ignoring unreadable metadata file');
      return;
    }

    const parsed = LedgerMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      this.logger.warn({ file: this.metaPath, issues }, 'Ignoring invalid metadata file');
      return;
    }

    const { expenses, budgets } = parsed.data;

    for (const category of Object.keys(expenses)) {
      ledger.addCategory(category);
    }
    for (const [category, budget] of Object.entries(budgets)) {
      ledger.restoreBudget(category, budget);
    }
    if (this.totalsSource === 'metadata') {
      ledger.restoreTotals(expenses);
    }
  }

  private readIfExists(path: string): string | null {
    try {
      return readFileSync(path, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(`Failed to read ${path}`, path, { cause: error });
    }
  }
}
