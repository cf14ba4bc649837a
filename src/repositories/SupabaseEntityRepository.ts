/**
 * Supabase implementation of IEntityRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEntityRepository, FindBySchemaOptions } from './IEntityRepository.js';
import type { EntityRow } from '../types/database.js';

export class SupabaseEntityRepository implements IEntityRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: string): Promise<EntityRow | null> {
    const { data, error } = await this.db
      .from('entities')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find entity: ${error.message}`);
    return data as EntityRow | null;
  }

  async findBySchema(schemaId: string, options: FindBySchemaOptions): Promise<EntityRow[]> {
    let query = this.db
      .from('entities')
      .select('*')
      .eq('schema_id', schemaId);

    if (options.excludeId) {
      query = query.neq('id', options.excludeId);
    }

    const { data, error } = await query
      .order('modified_at', { ascending: false })
      .limit(options.limit);

    if (error) throw new Error(`Failed to list entities: ${error.message}`);
    return (data ?? []) as EntityRow[];
  }
}
