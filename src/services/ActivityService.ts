/**
 * Per-target clone history. Registered as a clone observer; keeps the
 * newest entries only.
 */

import type { IActivityRepository } from '../repositories/IActivityRepository.js';
import type { CloneOutcome } from '../types/models.js';
import type { ActivityEntry } from '../types/api.js';
import type { CloneContext, CloneObserver } from './CloneService.js';

export const ACTIVITY_KEEP = 10;

export class ActivityService implements CloneObserver {
  constructor(private readonly activityRepo: IActivityRepository) {}

  async onAfterClone(context: CloneContext, outcome: CloneOutcome): Promise<void> {
    await this.activityRepo.insert({
      target_entity_id: context.target.id,
      source_entity_id: context.source.id,
      source_title: context.source.title,
      fields_cloned: outcome.clonedFields.length,
      success: outcome.success,
      actor_id: context.actor.id,
    });
    await this.activityRepo.trim(context.target.id, ACTIVITY_KEEP);
  }

  async list(targetEntityId: string): Promise<ActivityEntry[]> {
    const rows = await this.activityRepo.findByTarget(targetEntityId, ACTIVITY_KEEP);
    return rows.map((row) => ({
      sourceEntityId: row.source_entity_id,
      sourceTitle: row.source_title,
      fieldsCloned: row.fields_cloned,
      success: row.success,
      actorId: row.actor_id,
      createdAt: row.created_at,
    }));
  }
}
