/**
 * Supabase implementation of IProfileRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IProfileRepository } from './IProfileRepository.js';
import type { ProfileRow } from '../types/database.js';

export class SupabaseProfileRepository implements IProfileRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(row: ProfileRow): Promise<ProfileRow> {
    const { data, error } = await this.db
      .from('profiles')
      .upsert(row, { onConflict: 'owner_id' })
      .select()
      .single();

    if (error) throw new Error(`Failed to upsert profile: ${error.message}`);
    return data as ProfileRow;
  }

  async findByOwner(ownerId: string): Promise<ProfileRow | null> {
    const { data, error } = await this.db
      .from('profiles')
      .select('*')
      .eq('owner_id', ownerId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find profile: ${error.message}`);
    return data as ProfileRow | null;
  }
}
