/**
 * Expense Service Types
 */

import type { Logger } from '@spendbook/observability';
import type { LedgerRepository } from '../persistence/ledger-repository.js';
import type { PersistenceError } from '../persistence/persistence-errors.js';

/**
 * Outcome of writing the ledger after a mutation.
 * A failed save never undoes the in-memory change.
 */
export type SaveOutcome = { saved: true } | { saved: false; error: PersistenceError };

export type MutationResult<T> = SaveOutcome & { value: T };

export interface OpenExpenseServiceParams {
  repository: LedgerRepository;
  logger: Logger;
}
