/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger input violations.
 * Thrown before any state changes; the terminal session reports them and re-prompts.
 */

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class InvalidCategoryError extends LedgerError {
  constructor(category: string) {
    super(`Invalid category: "${category}"`);
    this.name = 'InvalidCategoryError';
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(amount: unknown, reason: string) {
    super(`Invalid amount "${String(amount)}": ${reason}`);
    this.name = 'InvalidAmountError';
  }
}

export class InvalidDateError extends LedgerError {
  constructor(date: string) {
    super(`Invalid date "${date}": expected YYYY-MM-DD`);
    this.name = 'InvalidDateError';
  }
}

export class InvalidPeriodError extends LedgerError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPeriodError';
  }
}
