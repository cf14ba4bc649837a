/**
 * Supabase implementation of IActorRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IActorRepository } from './IActorRepository.js';
import type { ActorRow } from '../types/database.js';

export class SupabaseActorRepository implements IActorRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<ActorRow, 'created_at'>): Promise<ActorRow> {
    const { data, error } = await this.db
      .from('actors')
      .insert({
        id: row.id,
        api_key_hash: row.api_key_hash,
        display_name: row.display_name,
        role: row.role,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert actor: ${error.message}`);
    return data as ActorRow;
  }

  async findById(id: string): Promise<ActorRow | null> {
    const { data, error } = await this.db
      .from('actors')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find actor: ${error.message}`);
    return data as ActorRow | null;
  }

  async findByApiKeyHash(hash: string): Promise<ActorRow | null> {
    const { data, error } = await this.db
      .from('actors')
      .select('*')
      .eq('api_key_hash', hash)
      .maybeSingle();

    if (error) throw new Error(`Failed to find actor by key: ${error.message}`);
    return data as ActorRow | null;
  }
}
