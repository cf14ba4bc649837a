/**
 * Schema registry access.
 * Returns the ordered field groups that apply to a schema.
 */

import type { FieldGroup } from '../types/models.js';

export interface ISchemaRepository {
  /** Field groups in display order, descriptors already parsed. */
  getFieldGroups(schemaId: string): Promise<FieldGroup[]>;
}
