/**
 * Entity lookups gated by the caller's edit capability.
 */

import type { IEntityRepository } from '../repositories/IEntityRepository.js';
import type { Actor, Entity } from '../types/models.js';
import { ForbiddenError, NotFoundError } from '../errors.js';
import { canEdit } from './capabilities.js';
import { rowToEntity } from './entities.js';

export class EntityService {
  constructor(private readonly entityRepo: IEntityRepository) {}

  async getById(entityId: string): Promise<Entity> {
    const row = await this.entityRepo.findById(entityId);
    if (!row) {
      throw new NotFoundError(`Entity "${entityId}" not found`);
    }
    return rowToEntity(row);
  }

  async getEditable(entityId: string, actor: Actor): Promise<Entity> {
    const entity = await this.getById(entityId);
    if (!canEdit(actor, entity)) {
      throw new ForbiddenError(`You do not have permission to edit entity "${entityId}"`);
    }
    return entity;
  }
}
