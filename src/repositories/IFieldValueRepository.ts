/**
 * Field value store.
 * One value per (entity, field key); composite values are stored whole.
 */

import type { FieldValue } from '../types/models.js';

export interface IFieldValueRepository {
  /** Stored value, or null when the entity has none for this key. */
  get(entityId: string, fieldKey: string): Promise<FieldValue>;

  /** Insert or replace the value for one field. */
  set(entityId: string, fieldKey: string, value: FieldValue): Promise<void>;
}
