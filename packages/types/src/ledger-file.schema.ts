/**
 * Metadata sidecar schema
 *
 * The JSON document stored beside the record file:
 * - expenses: category totals snapshot
 * - budgets: category limits, null when no budget is set
 */

import { z } from 'zod';

export const LedgerMetadataSchema = z.object({
  expenses: z.record(z.string(), z.number().finite().nonnegative()).default({}),
  budgets: z.record(z.string(), z.number().finite().positive().nullable()).default({}),
});

export type LedgerMetadata = z.infer<typeof LedgerMetadataSchema>;

/**
 * Column order of the record file
 */
export const RECORD_FILE_HEADER = ['date', 'category', 'amount', 'description'] as const;
