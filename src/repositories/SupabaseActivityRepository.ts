/**
 * Supabase implementation of IActivityRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IActivityRepository } from './IActivityRepository.js';
import type { CloneActivityRow } from '../types/database.js';

export class SupabaseActivityRepository implements IActivityRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<CloneActivityRow, 'id' | 'created_at'>): Promise<CloneActivityRow> {
    const { data, error } = await this.db
      .from('clone_activity')
      .insert({
        target_entity_id: row.target_entity_id,
        source_entity_id: row.source_entity_id,
        source_title: row.source_title,
        fields_cloned: row.fields_cloned,
        success: row.success,
        actor_id: row.actor_id,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to record clone activity: ${error.message}`);
    return data as CloneActivityRow;
  }

  async findByTarget(targetEntityId: string, limit: number): Promise<CloneActivityRow[]> {
    const { data, error } = await this.db
      .from('clone_activity')
      .select('*')
      .eq('target_entity_id', targetEntityId)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) throw new Error(`Failed to fetch clone activity: ${error.message}`);
    return (data ?? []) as CloneActivityRow[];
  }

  async trim(targetEntityId: string, keep: number): Promise<void> {
    const { data, error } = await this.db
      .from('clone_activity')
      .select('id')
      .eq('target_entity_id', targetEntityId)
      .order('created_at', { ascending: false })
      .range(keep, keep + 999);

    if (error) throw new Error(`Failed to fetch stale clone activity: ${error.message}`);

    const staleIds = ((data ?? []) as Array<{ id: string }>).map((r) => r.id);
    if (staleIds.length === 0) return;

    const { error: deleteError } = await this.db
      .from('clone_activity')
      .delete()
      .in('id', staleIds);

    if (deleteError) throw new Error(`Failed to trim clone activity: ${deleteError.message}`);
  }
}
