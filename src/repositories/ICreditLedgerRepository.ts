/**
 * Credit ledger data access interface.
 * Entries are grouped by the descendant whose outcome produced them. They
 * are only written through IChainCommitRepository.
 */

import type { CreditLedgerRow } from '../types/database.js';

export type CreditLedgerInput = Omit<CreditLedgerRow, 'id'>;

export interface ICreditLedgerRepository {
  /** Entries credited to any of the given (ancestor) submissions. */
  findBySubmissions(submissionIds: string[]): Promise<CreditLedgerRow[]>;
}
