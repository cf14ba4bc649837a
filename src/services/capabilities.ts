/**
 * Role-based capability checks.
 * Administrators and editors may edit any entity; authors and contributors
 * only the entities they own.
 */

import type { Actor, Entity } from '../types/models.js';

export function canEdit(actor: Actor, entity: Entity): boolean {
  switch (actor.role) {
    case 'administrator':
    case 'editor':
      return true;
    case 'author':
    case 'contributor':
      return entity.ownerId !== null && entity.ownerId === actor.id;
  }
}

/** Retention sweeps and actor registration. */
export function canAdminister(actor: Actor): boolean {
  return actor.role === 'administrator';
}
