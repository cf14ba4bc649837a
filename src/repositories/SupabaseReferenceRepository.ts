/**
 * Supabase implementation of IReferenceRepository.
 * Attachments are entities with schema "attachment"; users are actors.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IReferenceRepository } from './IReferenceRepository.js';

const ATTACHMENT_SCHEMA = 'attachment';

export class SupabaseReferenceRepository implements IReferenceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async isAttachment(id: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('entities')
      .select('id', { count: 'exact', head: true })
      .eq('id', id)
      .eq('schema_id', ATTACHMENT_SCHEMA);

    if (error) throw new Error(`Failed to look up attachment: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async entityExists(id: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('entities')
      .select('id', { count: 'exact', head: true })
      .eq('id', id);

    if (error) throw new Error(`Failed to look up entity: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async taxonomyExists(taxonomy: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('taxonomies')
      .select('name', { count: 'exact', head: true })
      .eq('name', taxonomy);

    if (error) throw new Error(`Failed to look up taxonomy: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async termExists(taxonomy: string, termId: string): Promise<boolean> {
    if (!/^\d+$/.test(termId)) return false;

    const { count, error } = await this.db
      .from('terms')
      .select('id', { count: 'exact', head: true })
      .eq('taxonomy', taxonomy)
      .eq('id', Number(termId));

    if (error) throw new Error(`Failed to look up term: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async userExists(id: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('actors')
      .select('id', { count: 'exact', head: true })
      .eq('id', id);

    if (error) throw new Error(`Failed to look up user: ${error.message}`);
    return (count ?? 0) > 0;
  }
}
