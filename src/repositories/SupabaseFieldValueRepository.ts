/**
 * Supabase implementation of IFieldValueRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IFieldValueRepository } from './IFieldValueRepository.js';
import type { FieldValue } from '../types/models.js';
import type { FieldValueRow } from '../types/database.js';
import { toFieldValue } from '../fields/values.js';

export class SupabaseFieldValueRepository implements IFieldValueRepository {
  constructor(private readonly db: SupabaseClient) {}

  async get(entityId: string, fieldKey: string): Promise<FieldValue> {
    const { data, error } = await this.db
      .from('field_values')
      .select('value')
      .eq('entity_id', entityId)
      .eq('field_key', fieldKey)
      .maybeSingle();

    if (error) throw new Error(`Failed to read field value: ${error.message}`);
    return data ? toFieldValue(data.value) : null;
  }

  async set(entityId: string, fieldKey: string, value: FieldValue): Promise<void> {
    const row: FieldValueRow = {
      entity_id: entityId,
      field_key: fieldKey,
      value,
      updated_at: new Date().toISOString(),
    };
    const { error } = await this.db
      .from('field_values')
      .upsert(row, { onConflict: 'entity_id,field_key' });

    if (error) throw new Error(`Failed to write field value: ${error.message}`);
  }
}
