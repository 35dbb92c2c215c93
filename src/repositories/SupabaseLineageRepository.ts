/**
 * Supabase implementation of ILineageRepository.
 * A unique index on child_id backs the single-parent rule.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ILineageRepository } from './ILineageRepository.js';
import type { LineageEdgeRow } from '../types/database.js';

export class SupabaseLineageRepository implements ILineageRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findParentEdge(childId: string): Promise<LineageEdgeRow | null> {
    const { data, error } = await this.db
      .from('lineage_edges')
      .select('*')
      .eq('child_id', childId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find parent edge: ${error.message}`);
    return data as LineageEdgeRow | null;
  }

  async findChildren(parentId: string): Promise<LineageEdgeRow[]> {
    const { data, error } = await this.db
      .from('lineage_edges')
      .select('*')
      .eq('parent_id', parentId)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to find child edges: ${error.message}`);
    return (data ?? []) as LineageEdgeRow[];
  }

  async findByChildIds(childIds: string[]): Promise<LineageEdgeRow[]> {
    if (childIds.length === 0) return [];

    const { data, error } = await this.db
      .from('lineage_edges')
      .select('*')
      .in('child_id', childIds);

    if (error) throw new Error(`Failed to find lineage edges: ${error.message}`);
    return (data ?? []) as LineageEdgeRow[];
  }
}
