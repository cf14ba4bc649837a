/**
 * Entity data access interface.
 * Entities are owned by the host; the clone engine only reads them.
 */

import type { EntityRow } from '../types/database.js';

export interface FindBySchemaOptions {
  /** Leave this entity out of the results. */
  excludeId?: string;
  limit: number;
}

export interface IEntityRepository {
  findById(id: string): Promise<EntityRow | null>;

  /** Entities of one schema, most recently modified first. */
  findBySchema(schemaId: string, options: FindBySchemaOptions): Promise<EntityRow[]>;
}
