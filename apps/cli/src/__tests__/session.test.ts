/**
 * Tracker Session Tests
 *
 * Drives the menu loop with scripted answers against a real ledger and a
 * mocked repository.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ExpenseService, Ledger, PersistenceError } from '@spendbook/core';
import type { LedgerRepository } from '@spendbook/core';
import { createLogger } from '@spendbook/observability';
import { TrackerSession } from '../session.js';
import type { SessionIO } from '../session.js';

class ScriptedIO implements SessionIO {
  readonly output: string[] = [];
  readonly prompts: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? null;
  }

  print(text = ''): void {
    this.output.push(text);
  }
}

describe('TrackerSession', () => {
  let ledger: Ledger;
  let mockRepo: LedgerRepository;
  let service: ExpenseService;

  function run(answers: string[], reportFile = 'expense_report.txt') {
    const io = new ScriptedIO(answers);
    const session = new TrackerSession({ service, io, reportFile });
    return session.run().then(() => io);
  }

  beforeEach(() => {
    ledger = new Ledger({ now: () => new Date(2024, 0, 15) });
    mockRepo = {
      create: vi.fn(() => new Ledger()),
      load: vi.fn(() => ledger),
      save: vi.fn(),
    };
    service = new ExpenseService(ledger, mockRepo, createLogger({ level: 'silent' }));
  });

  describe('adding expenses', () => {
    it('should add an expense picked by number and save on exit', async () => {
      const io = await run(['1', '1', '12.5', ' lunch ', '0']);

      expect(io.output).toContain('Expense added: 12.50 to Food.');
      expect(ledger.history()).toEqual([
        { date: '2024-01-15', category: 'Food', amount: 12.5, description: 'lunch' },
      ]);
      expect(mockRepo.save).toHaveBeenCalledTimes(2);
      expect(io.output.at(-1)).toBe('Total Expenses: $12.50');
    });

    it('should reject an unknown category', async () => {
      const io = await run(['1', 'Travel', '0']);

      expect(io.output).toContain('Invalid category. Please try again.');
      expect(ledger.history()).toEqual([]);
    });

    it('should report an invalid amount and keep running', async () => {
      const io = await run(['1', 'food', 'abc', 'x', '3']);

      expect(io.output.some((line) => line.startsWith('Invalid amount "abc"'))).toBe(true);
      expect(io.output).toContain('Total Expenses: $0.00');
      expect(ledger.grandTotal()).toBe(0);
    });

    it('should warn when the save fails but keep the expense', async () => {
      vi.mocked(mockRepo.save).mockImplementation(() => {
        throw new PersistenceError('Failed to write expenses.txt', 'expenses.txt');
      });

      const io = await run(['1', '2', '4', '', '0']);

      expect(io.output).toContain(
        'Warning: changes kept in memory but not saved (Failed to write expenses.txt).'
      );
      expect(ledger.totalFor('Transportation')).toBe(4);
    });
  });

  describe('views', () => {
    beforeEach(() => {
      ledger.appendRecord({ date: '2024-01-02', category: 'Transportation', amount: 5, description: 'bus' });
      ledger.appendRecord({ date: '2024-01-01', category: 'Food', amount: 10, description: 'Coffee' });
      ledger.appendRecord({ date: '2024-02-01', category: 'Food', amount: 2.5, description: 'tea' });
    });

    it('should show totals by category and the grand total', async () => {
      const io = await run(['2', '3', '0']);

      expect(io.output).toContain('Food' + ' '.repeat(26) + '12.50');
      expect(io.output).toContain('Transportation' + ' '.repeat(17) + '5.00');
      expect(io.output).toContain('Total Expenses: $17.50');
    });

    it('should show the highest spending category', async () => {
      const io = await run(['4', '0']);

      expect(io.output).toContain('Highest Spending Category:');
      expect(io.output).toContain('Food: $12.50');
    });

    it('should filter history by a case-insensitive category name', async () => {
      const io = await run(['5', 'food', '', '2024-01-31', '0']);

      expect(io.output).toContain('2024-01-01  Food' + ' '.repeat(19) + '10.00  Coffee');
      expect(io.output.some((line) => line.includes('tea'))).toBe(false);
      expect(io.output.some((line) => line.includes('bus'))).toBe(false);
    });

    it('should report an invalid date filter', async () => {
      const io = await run(['5', '', 'last week', '', '0']);

      expect(io.output).toContain('Invalid date "last week": expected YYYY-MM-DD');
    });

    it('should print a monthly summary', async () => {
      const io = await run(['7', '2024', '1', '0']);

      expect(io.output).toContain('Monthly Summary for 2024-01');
      expect(io.output).toContain('2024-01-01 | Food            | $   10.00');
      expect(io.output).toContain('Total: $15.00');
    });

    it('should reject an out-of-range month', async () => {
      const io = await run(['7', '2024', '13', '0']);

      expect(io.output).toContain('Invalid month 2024-13: month must be 1-12');
    });

    it('should print a weekly summary', async () => {
      const io = await run(['8', '2024', '1', '0']);

      expect(io.output).toContain('Weekly Summary for 2024 Week 1');
      expect(io.output).toContain('Total: $15.00');
    });

    it('should reject non-numeric week input', async () => {
      const io = await run(['8', 'abc', '1', '0']);

      expect(io.output).toContain('Invalid year or week.');
    });

    it('should search descriptions', async () => {
      const io = await run(['9', 'COF', '0']);

      expect(io.output).toContain("Search results for 'COF':");
      expect(io.output).toContain('2024-01-01 | Food            | $   10.00 | Coffee');
    });
  });

  describe('budgets', () => {
    it('should set and then show a budget', async () => {
      const io = await run(['6', '1', '2', '50', '6', '2', '0']);

      expect(io.output).toContain('Budget for Transportation set to $50.00.');
      expect(io.output).toContain(
        'Transportation' + ' '.repeat(12) + '$50.00' + ' '.repeat(8) + '0.00' + ' '.repeat(6) + '$50.00'
      );
    });

    it('should clear a budget', async () => {
      ledger.setBudget('Food', 30);

      const io = await run(['6', '3', 'food', '0']);

      expect(io.output).toContain('Budget for Food cleared.');
      expect(ledger.snapshot().budgets.Food).toBeNull();
    });
  });

  describe('export and reset', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'spendbook-session-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should export to the default report file when no name is given', async () => {
      const reportFile = join(dir, 'report.txt');
      ledger.add('Food', 3, 'snack');

      const io = await run(['10', '', '0'], reportFile);

      expect(io.output).toContain(`Report exported to ${reportFile}.`);
      expect(readFileSync(reportFile, 'utf8')).toContain('2024-01-15, Food, $3.00, snack');
    });

    it('should report a failed export', async () => {
      const blocker = join(dir, 'not-a-directory');
      writeFileSync(blocker, '');
      const target = join(blocker, 'report.txt');

      const io = await run(['10', target, '0']);

      expect(io.output).toContain(`Error: Failed to write ${target}`);
      expect(existsSync(target)).toBe(false);
    });

    it('should only remove everything after confirmation', async () => {
      ledger.add('Food', 3);

      const io = await run(['11', 'n', '2', '11', 'Y', '0']);

      expect(io.output).toContain('Food' + ' '.repeat(27) + '3.00');
      expect(io.output).toContain('All expenses have been removed and totals reset to zero.');
      expect(ledger.history()).toEqual([]);
      expect(ledger.grandTotal()).toBe(0);
    });
  });

  describe('after a failed load', () => {
    beforeEach(() => {
      vi.mocked(mockRepo.load).mockImplementation(() => {
        throw new PersistenceError('Failed to read expenses.txt', 'expenses.txt');
      });
      service = ExpenseService.open({
        repository: mockRepo,
        logger: createLogger({ level: 'silent' }),
      }).service;
    });

    it('should keep changes in memory when the overwrite is declined', async () => {
      const io = await run(['n', '1', '1', '5', '', '0']);

      expect(io.output).toContain(
        'Error loading data: Failed to read expenses.txt. Starting with an empty ledger.'
      );
      expect(io.output).toContain('Changes will be kept in memory only for this session.');
      expect(io.output).toContain('Expense added: 5.00 to Food.');
      expect(io.output).toContain(
        'Warning: changes kept in memory but not saved (Failed to read expenses.txt).'
      );
      expect(mockRepo.save).not.toHaveBeenCalled();
    });

    it('should save once the overwrite is confirmed', async () => {
      const io = await run(['y', '1', '1', '5', '', '0']);

      expect(io.output).toContain('Stored data will be overwritten on the next save.');
      expect(mockRepo.save).toHaveBeenCalledTimes(2);
      expect(io.output.some((line) => line.startsWith('Warning:'))).toBe(false);
    });
  });

  describe('menu handling', () => {
    it('should reject unknown options', async () => {
      const io = await run(['42', '0']);

      expect(io.output).toContain('Invalid selection. Please try again.');
    });

    it('should flush and say goodbye when input ends', async () => {
      const io = await run([]);

      expect(mockRepo.save).toHaveBeenCalledTimes(1);
      expect(io.output).toContain('Goodbye!');
    });
  });
});
