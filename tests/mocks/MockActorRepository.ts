/**
 * In-memory mock for IActorRepository.
 */

import type { IActorRepository } from '../../src/repositories/IActorRepository.js';
import type { ActorRow } from '../../src/types/database.js';

export class MockActorRepository implements IActorRepository {
  private actors = new Map<string, ActorRow>();

  async insert(row: Omit<ActorRow, 'created_at'>): Promise<ActorRow> {
    if (this.actors.has(row.id)) {
      throw new Error(`Actor with id "${row.id}" already exists`);
    }
    const full: ActorRow = { ...row, created_at: new Date().toISOString() };
    this.actors.set(row.id, full);
    return full;
  }

  async findById(id: string): Promise<ActorRow | null> {
    return this.actors.get(id) ?? null;
  }

  async findByApiKeyHash(hash: string): Promise<ActorRow | null> {
    for (const actor of this.actors.values()) {
      if (actor.api_key_hash === hash) {
        return actor;
      }
    }
    return null;
  }

  // ── Test Helpers ──

  clear(): void {
    this.actors.clear();
  }

  getAll(): ActorRow[] {
    return [...this.actors.values()];
  }
}
