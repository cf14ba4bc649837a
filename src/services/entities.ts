/**
 * Row-to-model mapping shared by the services that read entities and actors.
 */

import type { ActorRow, EntityRow } from '../types/database.js';
import type { Actor, ActorRole, Entity } from '../types/models.js';

const ROLES: readonly ActorRole[] = ['administrator', 'editor', 'author', 'contributor'];

export function rowToEntity(row: EntityRow): Entity {
  return {
    id: row.id,
    schemaId: row.schema_id,
    title: row.title,
    status: row.status,
    ownerId: row.owner_id,
    modifiedAt: new Date(row.modified_at),
  };
}

export function rowToActor(row: ActorRow): Actor {
  return {
    id: row.id,
    apiKeyHash: row.api_key_hash,
    displayName: row.display_name,
    role: toRole(row.role),
    createdAt: new Date(row.created_at),
  };
}

/** Unknown roles get the least privileged one. */
export function toRole(raw: string): ActorRole {
  return ROLES.find((r) => r === raw) ?? 'contributor';
}

export function isRole(raw: string): raw is ActorRole {
  return ROLES.some((r) => r === raw);
}
