/**
 * Ledger
 *
 * In-memory aggregate of category totals, budgets and expense history.
 * Owns no I/O; persistence hydrates it through appendRecord/restore* and
 * reads it back through snapshot().
 */

import { AmountSchema, DEFAULT_CATEGORIES } from '@spendbook/types';
import type { Amount } from '@spendbook/types';
import { dateParts, formatLocalDate, isIsoDate, isoWeekOf } from './calendar.js';
import {
  InvalidAmountError,
  InvalidCategoryError,
  InvalidDateError,
  InvalidPeriodError,
} from './ledger-errors.js';
import type {
  BudgetStatus,
  CategoryTotal,
  ExpenseRecord,
  HistoryFilter,
  LedgerOptions,
  LedgerSnapshot,
  PeriodAggregate,
  TopCategories,
} from './ledger-types.js';

function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export class Ledger {
  // Map iteration order is category definition order
  private readonly totals = new Map<string, number>();
  private readonly budgets = new Map<string, number | null>();
  private readonly records: ExpenseRecord[] = [];
  private readonly now: () => Date;
  private readonly resetClearsBudgets: boolean;

  constructor(options: LedgerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.resetClearsBudgets = options.resetClearsBudgets ?? false;

    for (const category of options.categories ?? DEFAULT_CATEGORIES) {
      this.addCategory(category);
    }
  }

  categories(): string[] {
    return [...this.totals.keys()];
  }

  hasCategory(category: string): boolean {
    return this.totals.has(category);
  }

  /**
   * Register a category with a zero total and no budget; no-op if it exists
   */
  addCategory(category: string): void {
    if (this.totals.has(category)) return;
    this.totals.set(category, 0);
    this.budgets.set(category, null);
  }

  /**
   * Record a new expense dated today
   *
   * @throws InvalidCategoryError if the category is unknown
   * @throws InvalidAmountError if the amount is not a positive decimal
   */
  add(category: string, amount: Amount, description = ''): ExpenseRecord {
    this.assertCategory(category);
    const value = this.parseAmount(amount);

    return this.appendRecord({
      date: formatLocalDate(this.now()),
      category,
      amount: value,
      description,
    });
  }

  /**
   * Append an already-dated record, registering its category when unknown.
   * Used when rehydrating from disk.
   *
   * @throws InvalidDateError if the date is not a real YYYY-MM-DD day
   * @throws InvalidAmountError if the amount is not positive and finite
   * @throws InvalidCategoryError if the category name is empty
   */
  appendRecord(record: ExpenseRecord): ExpenseRecord {
    this.assertDate(record.date);
    const amount = this.parseAmount(record.amount);
    if (record.category.length === 0) {
      throw new InvalidCategoryError(record.category);
    }

    this.addCategory(record.category);
    const stored: ExpenseRecord = Object.freeze({ ...record, amount });
    this.records.push(stored);
    this.totals.set(stored.category, (this.totals.get(stored.category) ?? 0) + stored.amount);
    return stored;
  }

  totalsByCategory(): CategoryTotal[] {
    const result: CategoryTotal[] = [];
    for (const [category, total] of this.totals) {
      if (total > 0) {
        result.push({ category, total });
      }
    }
    return result;
  }

  totalFor(category: string): number {
    return this.totals.get(category) ?? 0;
  }

  grandTotal(): number {
    let sum = 0;
    for (const total of this.totals.values()) {
      sum += total;
    }
    return sum;
  }

  /**
   * Categories sharing the highest total, or null when nothing has been spent.
   * Totals are compared in whole cents.
   */
  topCategories(): TopCategories | null {
    const max = Math.max(0, ...this.totals.values());
    if (max === 0) {
      return null;
    }

    const maxCents = toCents(max);
    const categories = [...this.totals]
      .filter(([, total]) => toCents(total) === maxCents)
      .map(([category]) => category);

    return { categories, amount: max };
  }

  history(filter: HistoryFilter = {}): ExpenseRecord[] {
    const { category, from, to, order = 'insertion' } = filter;
    if (from !== undefined) this.assertDate(from);
    if (to !== undefined) this.assertDate(to);

    const matches = this.records.filter((record) => {
      if (category !== undefined && record.category !== category) return false;
      if (from !== undefined && record.date < from) return false;
      if (to !== undefined && record.date > to) return false;
      return true;
    });

    if (order === 'date') {
      // Array.prototype.sort is stable, so same-day records keep insertion order
      matches.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    }

    return matches;
  }

  search(keyword: string): ExpenseRecord[] {
    const needle = keyword.toLowerCase();
    return this.records.filter((record) => record.description.toLowerCase().includes(needle));
  }

  monthlyAggregate(year: number, month: number): PeriodAggregate {
    if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidPeriodError(`Invalid month ${year}-${month}: month must be 1-12`);
    }

    return this.aggregate((record) => {
      const parts = dateParts(record.date);
      return parts.year === year && parts.month === month;
    });
  }

  weeklyAggregate(year: number, isoWeek: number): PeriodAggregate {
    if (!Number.isInteger(year) || !Number.isInteger(isoWeek) || isoWeek < 1 || isoWeek > 53) {
      throw new InvalidPeriodError(`Invalid week ${year}-W${isoWeek}: week must be 1-53`);
    }

    return this.aggregate((record) => {
      const week = isoWeekOf(record.date);
      return week.year === year && week.week === isoWeek;
    });
  }

  /**
   * Set a positive spending limit for a category
   *
   * @throws InvalidCategoryError if the category is unknown
   * @throws InvalidAmountError if the limit is not a positive decimal
   */
  setBudget(category: string, amount: Amount): number {
    this.assertCategory(category);
    const value = this.parseAmount(amount);
    this.budgets.set(category, value);
    return value;
  }

  clearBudget(category: string): void {
    this.assertCategory(category);
    this.budgets.set(category, null);
  }

  budgetStatus(): BudgetStatus[] {
    return [...this.budgets].map(([category, budget]) => {
      const spent = this.totalFor(category);
      return {
        category,
        budget,
        spent,
        remaining: budget === null ? null : budget - spent,
      };
    });
  }

  /**
   * Zero every total and clear history. Budgets survive unless the ledger
   * was built with resetClearsBudgets.
   */
  resetAll(): void {
    for (const category of this.totals.keys()) {
      this.totals.set(category, 0);
      if (this.resetClearsBudgets) {
        this.budgets.set(category, null);
      }
    }
    this.records.length = 0;
  }

  /**
   * Replace category totals with stored values; unknown categories are added
   */
  restoreTotals(totals: Record<string, number>): void {
    for (const category of this.totals.keys()) {
      this.totals.set(category, 0);
    }
    for (const [category, total] of Object.entries(totals)) {
      this.addCategory(category);
      this.totals.set(category, Math.max(0, total));
    }
  }

  restoreBudget(category: string, budget: number | null): void {
    this.addCategory(category);
    this.budgets.set(category, budget !== null && budget > 0 ? budget : null);
  }

  snapshot(): LedgerSnapshot {
    return {
      categories: this.categories(),
      totals: Object.fromEntries(this.totals),
      budgets: Object.fromEntries(this.budgets),
      history: [...this.records],
    };
  }

  private aggregate(predicate: (record: ExpenseRecord) => boolean): PeriodAggregate {
    const records = this.records.filter(predicate);
    const total = records.reduce((sum, record) => sum + record.amount, 0);
    return { records, total };
  }

  private assertCategory(category: string): void {
    if (!this.totals.has(category)) {
      throw new InvalidCategoryError(category);
    }
  }

  private assertDate(date: string): void {
    if (!isIsoDate(date)) {
      throw new InvalidDateError(date);
    }
  }

  private parseAmount(amount: Amount): number {
    const result = AmountSchema.safeParse(amount);
    if (!result.success) {
      const reason = result.error.errors.map((e) => e.message).join(', ');
      throw new InvalidAmountError(amount, reason);
    }
    return result.data;
  }
}
