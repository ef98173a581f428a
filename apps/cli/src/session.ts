/**
 * Interactive menu session
 *
 * Drives the expense service from line-based input. I/O goes through the
 * SessionIO port so the loop runs the same against a terminal or a script.
 */

import { LedgerError, PersistenceError, resolveCategory } from '@spendbook/core';
import type { ExpenseService, SaveOutcome } from '@spendbook/core';
import {
  formatBudgets,
  formatCategoryChoices,
  formatCategoryTotals,
  formatGrandTotal,
  formatHistory,
  formatMenu,
  formatPeriod,
  formatSearchResults,
  formatTopCategories,
  money,
} from './format.js';

export interface SessionIO {
  /**
   * Show a prompt and read one line; null once input has ended
   */
  ask(prompt: string): Promise<string | null>;
  print(text?: string): void;
}

export interface TrackerSessionOptions {
  service: ExpenseService;
  io: SessionIO;
  reportFile: string;
}

type Handler = () => Promise<void>;

const WHOLE_NUMBER = /^\d+$/;

export class TrackerSession {
  private readonly service: ExpenseService;
  private readonly io: SessionIO;
  private readonly reportFile: string;
  private readonly handlers: Record<string, Handler>;

  constructor(options: TrackerSessionOptions) {
    this.service = options.service;
    this.io = options.io;
    this.reportFile = options.reportFile;
    this.handlers = {
      '1': () => this.addExpense(),
      '2': async () => this.printLines(formatCategoryTotals(this.ledger.totalsByCategory())),
      '3': async () => this.printLines(['', formatGrandTotal(this.ledger.grandTotal())]),
      '4': async () => this.printLines(formatTopCategories(this.ledger.topCategories())),
      '5': () => this.viewHistory(),
      '6': () => this.budgets(),
      '7': () => this.monthlySummary(),
      '8': () => this.weeklySummary(),
      '9': () => this.search(),
      '10': () => this.exportReport(),
      '11': () => this.removeAll(),
    };
  }

  private get ledger() {
    return this.service.ledger;
  }

  /**
   * Run the menu loop until the user exits or input ends
   */
  async run(): Promise<void> {
    this.io.print('Welcome to the Personal Expense Tracker!');
    await this.confirmOverwrite();

    for (;;) {
      this.printLines(formatMenu());
      const choice = await this.io.ask('Select an option: ');
      if (choice === null || choice.trim() === '0') {
        this.exit();
        return;
      }

      const handler = this.handlers[choice.trim()];
      if (!handler) {
        this.io.print('Invalid selection. Please try again.');
        continue;
      }
      await this.guard(handler);
    }
  }

  /**
   * Stored data that failed to load is only replaced once the user agrees
   */
  private async confirmOverwrite(): Promise<void> {
    const loadError = this.service.saveBlockedBy;
    if (loadError === null) return;

    this.io.print(`Error loading data: ${loadError.message}. Starting with an empty ledger.`);
    const answer = await this.io.ask(
      'Overwrite the stored data with this session when saving? (y/n): '
    );
    if (answer?.trim().toLowerCase() === 'y') {
      this.service.allowOverwrite();
      this.io.print('Stored data will be overwritten on the next save.');
    } else {
      this.io.print('Changes will be kept in memory only for this session.');
    }
  }

  private async addExpense(): Promise<void> {
    const category = await this.askCategory();
    if (category === null) return;

    const amount = await this.io.ask('Amount: ');
    if (amount === null) return;
    const description = await this.io.ask('Description (optional): ');
    if (description === null) return;

    const result = this.service.addExpense(category, amount, description.trim());
    this.io.print(`Expense added: ${money(result.value.amount)} to ${category}.`);
    this.reportSave(result);
  }

  private async viewHistory(): Promise<void> {
    this.io.print('');
    this.io.print('Filter by category? (leave blank for all)');
    const categoryInput = await this.io.ask('Category: ');
    if (categoryInput === null) return;
    this.io.print('Filter by date range? (YYYY-MM-DD)');
    const from = await this.io.ask('Start date (leave blank): ');
    if (from === null) return;
    const to = await this.io.ask('End date (leave blank): ');
    if (to === null) return;

    const trimmed = categoryInput.trim();
    const category = trimmed
      ? (resolveCategory(trimmed, this.ledger.categories()) ?? trimmed)
      : undefined;

    const records = this.ledger.history({
      category,
      from: from.trim() || undefined,
      to: to.trim() || undefined,
      order: 'date',
    });
    this.printLines(formatHistory(records));
  }

  private async budgets(): Promise<void> {
    this.io.print('');
    this.io.print('1. Set Budget');
    this.io.print('2. View Budgets');
    this.io.print('3. Clear Budget');
    const choice = await this.io.ask('Select: ');
    if (choice === null) return;

    switch (choice.trim()) {
      case '1': {
        const category = await this.askCategory();
        if (category === null) return;
        const amount = await this.io.ask('Budget amount: ');
        if (amount === null) return;
        const result = this.service.setBudget(category, amount);
        this.io.print(`Budget for ${category} set to $${money(result.value)}.`);
        this.reportSave(result);
        return;
      }
      case '3': {
        const category = await this.askCategory();
        if (category === null) return;
        const result = this.service.clearBudget(category);
        this.io.print(`Budget for ${category} cleared.`);
        this.reportSave(result);
        return;
      }
      default:
        this.printLines(formatBudgets(this.ledger.budgetStatus()));
    }
  }

  private async monthlySummary(): Promise<void> {
    const year = await this.io.ask('Year (YYYY): ');
    if (year === null) return;
    const month = await this.io.ask('Month (1-12): ');
    if (month === null) return;

    if (!WHOLE_NUMBER.test(year.trim()) || !WHOLE_NUMBER.test(month.trim())) {
      this.io.print('Invalid year or month.');
      return;
    }

    const y = Number(year.trim());
    const m = Number(month.trim());
    const aggregate = this.ledger.monthlyAggregate(y, m);
    this.printLines(formatPeriod(`Monthly Summary for ${y}-${String(m).padStart(2, '0')}`, aggregate));
  }

  private async weeklySummary(): Promise<void> {
    const year = await this.io.ask('Year (YYYY): ');
    if (year === null) return;
    const week = await this.io.ask('Week number (1-53): ');
    if (week === null) return;

    if (!WHOLE_NUMBER.test(year.trim()) || !WHOLE_NUMBER.test(week.trim())) {
      this.io.print('Invalid year or week.');
      return;
    }

    const y = Number(year.trim());
    const w = Number(week.trim());
    this.printLines(formatPeriod(`Weekly Summary for ${y} Week ${w}`, this.ledger.weeklyAggregate(y, w)));
  }

  private async search(): Promise<void> {
    const keyword = await this.io.ask('Keyword to search: ');
    if (keyword === null) return;
    const trimmed = keyword.trim();
    this.printLines(formatSearchResults(trimmed, this.ledger.search(trimmed)));
  }

  private async exportReport(): Promise<void> {
    const answer = await this.io.ask(`Filename (default: ${this.reportFile}): `);
    if (answer === null) return;
    const filePath = answer.trim() || this.reportFile;

    this.service.exportReport(filePath);
    this.io.print(`Report exported to ${filePath}.`);
  }

  private async removeAll(): Promise<void> {
    const answer = await this.io.ask(
      'Are you sure you want to remove ALL expenses? This cannot be undone. (y/n): '
    );
    if (answer?.trim().toLowerCase() !== 'y') return;

    const result = this.service.resetAll();
    this.io.print('All expenses have been removed and totals reset to zero.');
    this.reportSave(result);
  }

  private exit(): void {
    this.io.print('Saving data and exiting...');
    this.reportSave(this.service.flush());
    this.io.print('Goodbye!');
    this.io.print(formatGrandTotal(this.ledger.grandTotal()));
  }

  private async askCategory(): Promise<string | null> {
    const categories = this.ledger.categories();
    this.printLines(formatCategoryChoices(categories));
    const input = await this.io.ask('Category (name or number): ');
    if (input === null) return null;

    const category = resolveCategory(input, categories);
    if (category === null) {
      this.io.print('Invalid category. Please try again.');
    }
    return category;
  }

  private reportSave(outcome: SaveOutcome): void {
    if (!outcome.saved) {
      this.io.print(`Warning: changes kept in memory but not saved (${outcome.error.message}).`);
    }
  }

  /**
   * Report recoverable errors and keep the session going
   */
  private async guard(handler: Handler): Promise<void> {
    try {
      await handler();
    } catch (error) {
      if (error instanceof LedgerError) {
        this.io.print(error.message);
        return;
      }
      if (error instanceof PersistenceError) {
        this.io.print(`Error: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.io.print(line);
    }
  }
}
