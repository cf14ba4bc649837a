/**
 * Actor data access interface.
 */

import type { ActorRow } from '../types/database.js';

export interface IActorRepository {
  insert(row: Omit<ActorRow, 'created_at'>): Promise<ActorRow>;

  findById(id: string): Promise<ActorRow | null>;

  findByApiKeyHash(hash: string): Promise<ActorRow | null>;
}
