/**
 * Clone activity log access.
 */

import type { CloneActivityRow } from '../types/database.js';

export interface IActivityRepository {
  insert(row: Omit<CloneActivityRow, 'id' | 'created_at'>): Promise<CloneActivityRow>;

  /** Most recent entries for a target entity, newest first. */
  findByTarget(targetEntityId: string, limit: number): Promise<CloneActivityRow[]>;

  /** Delete all but the `keep` newest entries for a target entity. */
  trim(targetEntityId: string, keep: number): Promise<void>;
}
