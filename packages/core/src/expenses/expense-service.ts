/**
 * Expense Service
 *
 * Orchestrates the in-memory ledger and its repository.
 * Every mutation is applied to the ledger first, then saved; a failed save
 * is reported in the result and logged, never thrown.
 *
 * After a failed load, saves are held back until allowOverwrite() is called,
 * so the unreadable files stay on disk untouched.
 */

import type { Amount } from '@spendbook/types';
import type { Logger } from '@spendbook/observability';
import type { Ledger } from '../ledger/ledger.js';
import type { ExpenseRecord } from '../ledger/ledger-types.js';
import type { LedgerRepository } from '../persistence/ledger-repository.js';
import { PersistenceError } from '../persistence/persistence-errors.js';
import { exportReport } from '../reports/report-exporter.js';
import type { MutationResult, OpenExpenseServiceParams, SaveOutcome } from './expense-types.js';

export interface OpenExpenseServiceResult {
  service: ExpenseService;
  /**
   * Set when stored data could not be read and an empty ledger was used instead
   */
  loadError: PersistenceError | null;
}

export class ExpenseService {
  private loadError: PersistenceError | null = null;

  constructor(
    readonly ledger: Ledger,
    private repository: LedgerRepository,
    private logger: Logger
  ) {}

  /**
   * Load the ledger through the repository and wrap it in a service
   *
   * Falls back to an empty ledger when loading fails with a PersistenceError.
   * Any other error propagates.
   */
  static open(params: OpenExpenseServiceParams): OpenExpenseServiceResult {
    const { repository, logger } = params;

    try {
      const ledger = repository.load();
      logger.info(
        { records: ledger.history().length, categories: ledger.categories().length },
        'Ledger loaded'
      );
      return { service: new ExpenseService(ledger, repository, logger), loadError: null };
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      logger.error({ err: error }, 'Failed to load ledger, starting with an empty one');
      const service = new ExpenseService(repository.create(), repository, logger);
      service.loadError = error;
      return { service, loadError: error };
    }
  }

  /**
   * Load failure that is currently holding back saves, if any
   */
  get saveBlockedBy(): PersistenceError | null {
    return this.loadError;
  }

  /**
   * Let later saves replace stored data that failed to load
   */
  allowOverwrite(): void {
    if (this.loadError === null) return;
    this.logger.warn({ file: this.loadError.path }, 'Overwrite of unreadable data allowed');
    this.loadError = null;
  }

  /**
   * Record an expense dated today and save
   *
   * @throws InvalidCategoryError if the category is unknown
   * @throws InvalidAmountError if the amount is not a positive decimal
   */
  addExpense(category: string, amount: Amount, description = ''): MutationResult<ExpenseRecord> {
    const record = this.ledger.add(category, amount, description);
    this.logger.info({ record }, 'Expense added');
    return { ...this.persist(), value: record };
  }

  /**
   * Set a category budget and save
   *
   * @throws InvalidCategoryError if the category is unknown
   * @throws InvalidAmountError if the limit is not a positive decimal
   */
  setBudget(category: string, amount: Amount): MutationResult<number> {
    const budget = this.ledger.setBudget(category, amount);
    this.logger.info({ category, budget }, 'Budget set');
    return { ...this.persist(), value: budget };
  }

  clearBudget(category: string): MutationResult<null> {
    this.ledger.clearBudget(category);
    this.logger.info({ category }, 'Budget cleared');
    return { ...this.persist(), value: null };
  }

  /**
   * Remove every expense and zero all totals, then save
   */
  resetAll(): MutationResult<number> {
    const removed = this.ledger.history().length;
    this.ledger.resetAll();
    this.logger.warn({ removed }, 'All expenses removed');
    return { ...this.persist(), value: removed };
  }

  /**
   * Write the report file for the full history
   *
   * @returns Number of records written
   * @throws PersistenceError if the report cannot be written
   */
  exportReport(filePath: string): number {
    const count = exportReport(this.ledger, filePath);
    this.logger.info({ file: filePath, records: count }, 'Report exported');
    return count;
  }

  /**
   * Save the current state; used for the final write at exit
   */
  flush(): SaveOutcome {
    return this.persist();
  }

  private persist(): SaveOutcome {
    if (this.loadError !== null) {
      this.logger.warn({ file: this.loadError.path }, 'Save skipped, stored data was not loaded');
      return { saved: false, error: this.loadError };
    }

    try {
      this.repository.save(this.ledger);
      return { saved: true };
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      this.logger.error({ err: error, file: error.path }, 'Failed to save ledger');
      return { saved: false, error };
    }
  }
}
