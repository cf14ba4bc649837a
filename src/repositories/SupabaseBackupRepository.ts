/**
 * Supabase implementation of IBackupRepository.
 * Each row holds the whole snapshot in `backup_data` (jsonb); `field_count` is
 * generated by the database from it and never written.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IBackupRepository } from './IBackupRepository.js';
import type { BackupRow } from '../types/database.js';

export class SupabaseBackupRepository implements IBackupRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<BackupRow, 'field_count'>): Promise<BackupRow> {
    const { data, error } = await this.db
      .from('field_backups')
      .insert({
        backup_id: row.backup_id,
        target_entity_id: row.target_entity_id,
        actor_id: row.actor_id,
        backup_data: row.backup_data,
        created_at: row.created_at,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert backup: ${error.message}`);
    return data as BackupRow;
  }

  async findById(backupId: string): Promise<BackupRow | null> {
    const { data, error } = await this.db
      .from('field_backups')
      .select('*')
      .eq('backup_id', backupId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find backup: ${error.message}`);
    return data as BackupRow | null;
  }

  async findByTarget(targetEntityId: string): Promise<BackupRow[]> {
    const { data, error } = await this.db
      .from('field_backups')
      .select('*')
      .eq('target_entity_id', targetEntityId)
      .order('created_at', { ascending: false });

    if (error) throw new Error(`Failed to fetch backups: ${error.message}`);
    return (data ?? []) as BackupRow[];
  }

  async delete(backupId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('field_backups')
      .delete({ count: 'exact' })
      .eq('backup_id', backupId);

    if (error) throw new Error(`Failed to delete backup: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const { count, error } = await this.db
      .from('field_backups')
      .delete({ count: 'exact' })
      .lt('created_at', cutoff.toISOString());

    if (error) throw new Error(`Failed to delete expired backups: ${error.message}`);
    return count ?? 0;
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from('field_backups')
      .select('backup_id', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count backups: ${error.message}`);
    return count ?? 0;
  }

  async findOldest(limit: number): Promise<BackupRow[]> {
    const { data, error } = await this.db
      .from('field_backups')
      .select('*')
      .order('created_at', { ascending: true })
      .limit(limit);

    if (error) throw new Error(`Failed to fetch oldest backups: ${error.message}`);
    return (data ?? []) as BackupRow[];
  }

  async deleteMany(backupIds: string[]): Promise<number> {
    if (backupIds.length === 0) return 0;

    const { count, error } = await this.db
      .from('field_backups')
      .delete({ count: 'exact' })
      .in('backup_id', backupIds);

    if (error) throw new Error(`Failed to delete backups: ${error.message}`);
    return count ?? 0;
  }
}
