/**
 * In-memory mock for IEntityRepository.
 */

import type { IEntityRepository, FindBySchemaOptions } from '../../src/repositories/IEntityRepository.js';
import type { EntityRow } from '../../src/types/database.js';

export class MockEntityRepository implements IEntityRepository {
  private entities = new Map<string, EntityRow>();

  async findById(id: string): Promise<EntityRow | null> {
    return this.entities.get(id) ?? null;
  }

  async findBySchema(schemaId: string, options: FindBySchemaOptions): Promise<EntityRow[]> {
    return [...this.entities.values()]
      .filter((e) => e.schema_id === schemaId && e.id !== options.excludeId)
      .sort((a, b) => b.modified_at.localeCompare(a.modified_at))
      .slice(0, options.limit);
  }

  // ── Test Helpers ──

  add(row: Partial<EntityRow> & { id: string }): EntityRow {
    const full: EntityRow = {
      schema_id: 'post',
      title: `Entity ${row.id}`,
      status: 'publish',
      owner_id: null,
      modified_at: '2026-01-01T00:00:00.000Z',
      ...row,
    };
    this.entities.set(full.id, full);
    return full;
  }

  clear(): void {
    this.entities.clear();
  }
}
