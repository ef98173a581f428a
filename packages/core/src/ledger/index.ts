/**
 * Ledger Domain
 *
 * Exports the in-memory ledger, its errors, types and input helpers.
 */

export { Ledger } from './ledger.js';

export { resolveCategory } from './category-resolver.js';
export { isoWeekOf, formatLocalDate, isIsoDate, dateParts } from './calendar.js';
export type { IsoWeek } from './calendar.js';

export {
  LedgerError,
  InvalidCategoryError,
  InvalidAmountError,
  InvalidDateError,
  InvalidPeriodError,
} from './ledger-errors.js';

export type {
  LedgerOptions,
  CategoryTotal,
  TopCategories,
  HistoryFilter,
  HistoryOrder,
  PeriodAggregate,
  BudgetStatus,
  LedgerSnapshot,
  ExpenseRecord,
  IsoDate,
} from './ledger-types.js';
