/**
 * In-memory mock for IBackupRepository.
 */

import type { IBackupRepository } from '../../src/repositories/IBackupRepository.js';
import type { BackupRow } from '../../src/types/database.js';

export class MockBackupRepository implements IBackupRepository {
  private backups = new Map<string, BackupRow>();
  failInserts = false;
  failAgeDeletes = false;

  async insert(row: Omit<BackupRow, 'field_count'>): Promise<BackupRow> {
    if (this.failInserts) {
      throw new Error('storage unavailable');
    }
    const full: BackupRow = {
      ...structuredClone(row),
      field_count: Object.keys(row.backup_data).length,
    };
    this.backups.set(full.backup_id, full);
    return full;
  }

  async findById(backupId: string): Promise<BackupRow | null> {
    return this.backups.get(backupId) ?? null;
  }

  async findByTarget(targetEntityId: string): Promise<BackupRow[]> {
    return this.sorted()
      .filter((b) => b.target_entity_id === targetEntityId)
      .reverse();
  }

  async delete(backupId: string): Promise<boolean> {
    return this.backups.delete(backupId);
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    if (this.failAgeDeletes) {
      throw new Error('age delete failed');
    }
    let deleted = 0;
    for (const row of [...this.backups.values()]) {
      if (new Date(row.created_at).getTime() < cutoff.getTime()) {
        this.backups.delete(row.backup_id);
        deleted++;
      }
    }
    return deleted;
  }

  async count(): Promise<number> {
    return this.backups.size;
  }

  async findOldest(limit: number): Promise<BackupRow[]> {
    return this.sorted().slice(0, limit);
  }

  async deleteMany(backupIds: string[]): Promise<number> {
    let deleted = 0;
    for (const id of backupIds) {
      if (this.backups.delete(id)) deleted++;
    }
    return deleted;
  }

  // ── Test Helpers ──

  /** Insert a row as-is, bypassing failInserts. */
  seed(row: BackupRow): void {
    this.backups.set(row.backup_id, row);
  }

  getAll(): BackupRow[] {
    return this.sorted();
  }

  clear(): void {
    this.backups.clear();
    this.failInserts = false;
    this.failAgeDeletes = false;
  }

  /** Oldest first. */
  private sorted(): BackupRow[] {
    return [...this.backups.values()].sort((a, b) => a.created_at.localeCompare(b.created_at));
  }
}
