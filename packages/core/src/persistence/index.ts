/**
 * Persistence Domain
 *
 * Flat-file storage for the ledger and the CSV codec behind it.
 */

export { FileLedgerRepository, DEFAULT_META_SUFFIX } from './file-ledger-repository.js';
export type { FileLedgerRepositoryOptions } from './file-ledger-repository.js';
export type { LedgerRepository, TotalsSource } from './ledger-repository.js';

export { PersistenceError } from './persistence-errors.js';
export { writeFileAtomicSync } from './atomic-write.js';
export { parseCsv, serializeCsv } from './csv.js';
