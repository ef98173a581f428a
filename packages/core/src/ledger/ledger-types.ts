/**
 * Ledger Domain Types
 *
 * Shapes returned by ledger queries and accepted by its constructor.
 */

import type { ExpenseRecord, IsoDate } from '@spendbook/types';

export type { ExpenseRecord, IsoDate };

export interface LedgerOptions {
  /**
   * Category definitions in display order (defaults to DEFAULT_CATEGORIES)
   */
  categories?: readonly string[];
  /**
   * Clock used to stamp new records
   */
  now?: () => Date;
  /**
   * Whether resetAll() also clears budgets
   */
  resetClearsBudgets?: boolean;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

/**
 * Result of topCategories(); null from the query means nothing to analyze
 */
export interface TopCategories {
  categories: string[];
  amount: number;
}

export type HistoryOrder = 'insertion' | 'date';

export interface HistoryFilter {
  category?: string | undefined;
  from?: IsoDate | undefined;
  to?: IsoDate | undefined;
  order?: HistoryOrder | undefined;
}

export interface PeriodAggregate {
  records: ExpenseRecord[];
  total: number;
}

export interface BudgetStatus {
  category: string;
  budget: number | null;
  spent: number;
  remaining: number | null; // can be negative (overspent)
}

/**
 * Plain copy of ledger state, used by persistence
 */
export interface LedgerSnapshot {
  categories: string[];
  totals: Record<string, number>;
  budgets: Record<string, number | null>;
  history: ExpenseRecord[];
}
