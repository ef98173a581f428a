/**
 * Expense schemas for amounts, calendar dates and stored records
 * Used to validate user input and rows read back from the record file
 */

import { z } from 'zod';

/**
 * Decimal text with '.' separator and an optional exponent
 * Rejects hex, signs, "Infinity" and blank input that Number() would accept
 */
export const DECIMAL_PATTERN = /^(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Amount accepted from users and files: a number, or decimal text
 * - must be finite and strictly positive
 */
export const AmountSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(DECIMAL_PATTERN, 'Amount must be a number')
      .transform((value) => Number(value)),
  ])
  .pipe(z.number().finite('Amount must be finite').positive('Amount must be positive'));

/**
 * Calendar date (no time) as YYYY-MM-DD
 * Rejects impossible dates such as 2024-02-30
 */
export const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Date must use the YYYY-MM-DD format')
  .refine((value) => {
    const [year, month, day] = value.split('-').map(Number);
    const parsed = new Date(Date.UTC(year ?? 0, (month ?? 0) - 1, day ?? 0));
    return (
      parsed.getUTCFullYear() === year &&
      parsed.getUTCMonth() + 1 === month &&
      parsed.getUTCDate() === day
    );
  }, 'Date does not exist');

export const CategoryNameSchema = z.string().min(1, 'Category name is required');

export const ExpenseRecordSchema = z.object({
  date: IsoDateSchema,
  category: CategoryNameSchema,
  amount: AmountSchema,
  description: z.string(),
});

export type Amount = z.input<typeof AmountSchema>;
export type IsoDate = z.infer<typeof IsoDateSchema>;
export type ExpenseRecord = Readonly<z.infer<typeof ExpenseRecordSchema>>;
