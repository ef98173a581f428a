/**
 * Expenses Domain
 *
 * Service layer over the ledger and its repository.
 */

export { ExpenseService } from './expense-service.js';
export type { OpenExpenseServiceResult } from './expense-service.js';
export type { MutationResult, SaveOutcome, OpenExpenseServiceParams } from './expense-types.js';
