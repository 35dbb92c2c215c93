/**
 * Supabase implementation of ISubmissionRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ISubmissionRepository } from './ISubmissionRepository.js';
import type { SubmissionRow } from '../types/database.js';

export class SupabaseSubmissionRepository implements ISubmissionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: SubmissionRow): Promise<SubmissionRow> {
    const { data, error } = await this.db
      .from('submissions')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert submission: ${error.message}`);
    return data as SubmissionRow;
  }

  async findById(id: string): Promise<SubmissionRow | null> {
    const { data, error } = await this.db
      .from('submissions')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find submission: ${error.message}`);
    return data as SubmissionRow | null;
  }

  async findByIds(ids: string[]): Promise<SubmissionRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db
      .from('submissions')
      .select('*')
      .in('id', ids);

    if (error) throw new Error(`Failed to find submissions: ${error.message}`);
    return (data ?? []) as SubmissionRow[];
  }

  async findByOwner(
    ownerId: string,
    options?: { since?: string }
  ): Promise<SubmissionRow[]> {
    let query = this.db.from('submissions').select('*').eq('owner_id', ownerId);
    if (options?.since) {
      query = query.gte('created_at', options.since);
    }

    const { data, error } = await query
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to find submissions: ${error.message}`);
    return (data ?? []) as SubmissionRow[];
  }
}
