/**
 * Ledger Repository
 *
 * Storage boundary for the ledger. The expense service depends on this
 * interface; FileLedgerRepository is the flat-file implementation.
 */

import type { Ledger } from '../ledger/ledger.js';

export interface LedgerRepository {
  /**
   * Build an empty ledger configured the same way load() would
   */
  create(): Ledger;

  /**
   * Build a ledger from stored state (an empty one when nothing is stored)
   *
   * @throws PersistenceError on I/O failure
   */
  load(): Ledger;

  /**
   * Overwrite stored state with the ledger's current contents
   *
   * @throws PersistenceError on I/O failure
   */
  save(ledger: Ledger): void;
}

/**
 * Which stored value wins for category totals on load
 * - records: recompute from the record file, ignore metadata totals
 * - metadata: trust the metadata snapshot
 */
export type TotalsSource = 'records' | 'metadata';
