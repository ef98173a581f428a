/**
 * Expense category definitions
 *
 * The default set every new ledger starts with. Ledgers may grow extra
 * categories at load time when persisted data names ones not listed here.
 */

export const DEFAULT_CATEGORIES = [
  'Food',
  'Transportation',
  'Entertainment',
  'Utilities',
  'Health',
  'Shopping',
  'Education',
  'Other',
] as const;

export type DefaultCategory = (typeof DEFAULT_CATEGORIES)[number];
