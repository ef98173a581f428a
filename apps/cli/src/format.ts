/**
 * Plain-text table rendering for the terminal session.
 * Every function returns lines; the session decides where they go.
 */
import type {
  BudgetStatus,
  CategoryTotal,
  ExpenseRecord,
  PeriodAggregate,
  TopCategories,
} from '@spendbook/core';

export const MENU_OPTIONS = [
  ['1', 'Add Expense'],
  ['2', 'View Expenses by Category'],
  ['3', 'View Total Expenses'],
  ['4', 'Find Highest Spending Category'],
  ['5', 'View Expense History'],
  ['6', 'Set/View Budgets'],
  ['7', 'Monthly Summary'],
  ['8', 'Weekly Summary'],
  ['9', 'Search Expenses'],
  ['10', 'Export Report'],
  ['11', 'Remove All Expenses'],
  ['0', 'Exit'],
] as const;

export function money(amount: number): string {
  return amount.toFixed(2);
}

export function formatMenu(): string[] {
  const rule = '='.repeat(40);
  return [
    '',
    rule,
    'Personal Expense Tracker',
    rule,
    ...MENU_OPTIONS.map(([key, label]) => `${key}. ${label}`),
    rule,
  ];
}

export function formatCategoryChoices(categories: readonly string[]): string[] {
  return ['', 'Available categories:', ...categories.map((category, i) => `  ${i + 1}. ${category}`)];
}

export function formatCategoryTotals(totals: readonly CategoryTotal[]): string[] {
  const lines = ['', `${'Category'.padEnd(20)}${'Total Spent'.padStart(15)}`, '-'.repeat(35)];
  if (totals.length === 0) {
    return [...lines, 'No expenses recorded yet.'];
  }
  return [
    ...lines,
    ...totals.map(({ category, total }) => `${category.padEnd(20)}${money(total).padStart(15)}`),
  ];
}

export function formatGrandTotal(total: number): string {
  return `Total Expenses: $${money(total)}`;
}

export function formatTopCategories(top: TopCategories | null): string[] {
  if (top === null) {
    return ['No expenses to analyze.'];
  }
  return [
    '',
    'Highest Spending Category:',
    ...top.categories.map((category) => `${category}: $${money(top.amount)}`),
  ];
}

export function formatHistory(records: readonly ExpenseRecord[]): string[] {
  const lines = [
    '',
    `${'Date'.padEnd(12)}${'Category'.padEnd(18)}${'Amount'.padStart(10)}  Description`,
    '-'.repeat(70),
  ];
  if (records.length === 0) {
    return [...lines, 'No expenses found for the given filter.'];
  }
  return [
    ...lines,
    ...records.map(
      (r) =>
        `${r.date.padEnd(12)}${r.category.padEnd(18)}${money(r.amount).padStart(10)}  ${r.description}`
    ),
  ];
}

export function formatBudgets(statuses: readonly BudgetStatus[]): string[] {
  const dollars = (value: number | null) => (value === null ? '-' : `$${money(value)}`);
  return [
    '',
    `${'Category'.padEnd(20)}${'Budget'.padStart(12)}${'Spent'.padStart(12)}${'Remaining'.padStart(12)}`,
    '-'.repeat(56),
    ...statuses.map(
      (s) =>
        `${s.category.padEnd(20)}${dollars(s.budget).padStart(12)}${money(s.spent).padStart(12)}${dollars(s.remaining).padStart(12)}`
    ),
  ];
}

function formatPeriodLine(record: ExpenseRecord): string {
  return `${record.date} | ${record.category.padEnd(15)} | $${money(record.amount).padStart(8)}`;
}

export function formatPeriod(title: string, aggregate: PeriodAggregate): string[] {
  return [
    '',
    title,
    '-'.repeat(40),
    ...aggregate.records.map(formatPeriodLine),
    `Total: $${money(aggregate.total)}`,
  ];
}

export function formatSearchResults(keyword: string, records: readonly ExpenseRecord[]): string[] {
  const header = ['', `Search results for '${keyword}':`];
  if (records.length === 0) {
    return [...header, 'No matching expenses found.'];
  }
  return [...header, ...records.map((r) => `${formatPeriodLine(r)} | ${r.description}`)];
}
