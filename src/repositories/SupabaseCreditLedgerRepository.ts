/**
 * Supabase implementation of ICreditLedgerRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ICreditLedgerRepository } from './ICreditLedgerRepository.js';
import type { CreditLedgerRow } from '../types/database.js';

export class SupabaseCreditLedgerRepository implements ICreditLedgerRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findBySubmissions(submissionIds: string[]): Promise<CreditLedgerRow[]> {
    if (submissionIds.length === 0) return [];

    const { data, error } = await this.db
      .from('credit_ledger')
      .select('*')
      .in('submission_id', submissionIds);

    if (error) throw new Error(`Failed to find ledger entries: ${error.message}`);
    return (data ?? []) as CreditLedgerRow[];
  }
}
