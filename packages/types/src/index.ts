export { DEFAULT_CATEGORIES } from './categories.js';
export type { DefaultCategory } from './categories.js';

export {
  AmountSchema,
  IsoDateSchema,
  CategoryNameSchema,
  ExpenseRecordSchema,
  DECIMAL_PATTERN,
  ISO_DATE_PATTERN,
} from './expense.schema.js';
export type { Amount, IsoDate, ExpenseRecord } from './expense.schema.js';

export { LedgerMetadataSchema, RECORD_FILE_HEADER } from './ledger-file.schema.js';
export type { LedgerMetadata } from './ledger-file.schema.js';
