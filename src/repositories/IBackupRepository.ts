/**
 * Backup data access interface.
 * Rows are inserted whole and never updated; deletion is the only mutation.
 */

import type { BackupRow } from '../types/database.js';

export interface IBackupRepository {
  insert(row: Omit<BackupRow, 'field_count'>): Promise<BackupRow>;

  findById(backupId: string): Promise<BackupRow | null>;

  /** Backups of one entity, newest first. */
  findByTarget(targetEntityId: string): Promise<BackupRow[]>;

  /** Returns false when no row matched. */
  delete(backupId: string): Promise<boolean>;

  /** Delete every backup created before the cutoff. Returns the number deleted. */
  deleteOlderThan(cutoff: Date): Promise<number>;

  count(): Promise<number>;

  /** The `limit` oldest backups, oldest first. */
  findOldest(limit: number): Promise<BackupRow[]>;

  /** Returns the number deleted. */
  deleteMany(backupIds: string[]): Promise<number>;
}
