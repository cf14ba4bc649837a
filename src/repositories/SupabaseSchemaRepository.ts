/**
 * Supabase implementation of ISchemaRepository.
 * Descriptors live in a jsonb column and are parsed on every read.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ISchemaRepository } from './ISchemaRepository.js';
import type { FieldGroupRow } from '../types/database.js';
import type { FieldGroup } from '../types/models.js';
import { parseFieldGroup } from '../fields/descriptors.js';

export class SupabaseSchemaRepository implements ISchemaRepository {
  constructor(private readonly db: SupabaseClient) {}

  async getFieldGroups(schemaId: string): Promise<FieldGroup[]> {
    const { data, error } = await this.db
      .from('field_groups')
      .select('*')
      .eq('schema_id', schemaId)
      .order('position', { ascending: true });

    if (error) throw new Error(`Failed to fetch field groups: ${error.message}`);
    return ((data ?? []) as FieldGroupRow[]).map((row) => parseFieldGroup(row));
  }
}
