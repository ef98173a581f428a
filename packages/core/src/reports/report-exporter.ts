/**
 * Report Exporter
 *
 * Human-readable expense report: a title, a rule, then one line per record
 * formatted as `date, category, $amount, description`.
 */

import type { Ledger } from '../ledger/ledger.js';
import type { ExpenseRecord } from '../ledger/ledger-types.js';
import { writeFileAtomicSync } from '../persistence/atomic-write.js';

export const DEFAULT_REPORT_FILE = 'expense_report.txt';

export function renderReport(records: readonly ExpenseRecord[]): string {
  const lines = [
    'Expense Report',
    '='.repeat(40),
    ...records.map(
      (record) =>
        `${record.date}, ${record.category}, $${record.amount.toFixed(2)}, ${record.description}`
    ),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Write the full history report to a file
 *
 * @returns Number of records written
 * @throws PersistenceError if the file cannot be written
 */
export function exportReport(ledger: Ledger, filePath: string = DEFAULT_REPORT_FILE): number {
  const records = ledger.history();
  writeFileAtomicSync(filePath, renderReport(records));
  return records.length;
}
