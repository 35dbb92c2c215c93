/**
 * Supabase implementation of IOutcomeRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IOutcomeRepository } from './IOutcomeRepository.js';
import type { OutcomeRow } from '../types/database.js';

export class SupabaseOutcomeRepository implements IOutcomeRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findBySubmission(submissionId: string): Promise<OutcomeRow | null> {
    const { data, error } = await this.db
      .from('outcomes')
      .select('*')
      .eq('submission_id', submissionId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find outcome: ${error.message}`);
    return data as OutcomeRow | null;
  }

  async findBySubmissions(submissionIds: string[]): Promise<OutcomeRow[]> {
    if (submissionIds.length === 0) return [];

    const { data, error } = await this.db
      .from('outcomes')
      .select('*')
      .in('submission_id', submissionIds);

    if (error) throw new Error(`Failed to find outcomes: ${error.message}`);
    return (data ?? []) as OutcomeRow[];
  }
}
