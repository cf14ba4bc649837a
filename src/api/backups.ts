/**
 * Backup and history endpoints.
 * GET    /api/v1/entities/:id/backups    Backups of an entity, newest first
 * GET    /api/v1/entities/:id/activity   Recent clones into an entity
 * POST   /api/v1/backups/:id/restore     Restore a backup (body: { deleteAfter? })
 * DELETE /api/v1/backups/:id             Delete a backup
 * POST   /api/v1/backups/sweep           Run retention now (administrators)
 */

import { pipeline, errorHandler, requireActor } from '../middleware/index.js';
import { readJsonObject } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BackupListResponse } from '../types/api.js';
import type { Actor, BackupRecord } from '../types/models.js';
import { ForbiddenError, NotFoundError } from '../errors.js';
import { canAdminister } from '../services/capabilities.js';
import { json, pathParam, readFlag } from './http.js';

export function createBackupHandlers(container: Container) {
  const authed = pipeline(container.logging, errorHandler, container.authenticate);

  /** The backup, provided the actor may edit the entity it belongs to. */
  async function loadBackup(backupId: string, actor: Actor): Promise<BackupRecord> {
    const record = await container.backupService.get(backupId);
    if (!record) {
      throw new NotFoundError(`Backup "${backupId}" not found`);
    }
    await container.entityService.getEditable(record.targetEntityId, actor);
    return record;
  }

  const list: Handler = authed(async (req, ctx) => {
    const entity = await container.entityService.getEditable(pathParam(req, 1), requireActor(ctx));
    const records = await container.backupService.list(entity.id);

    const body: BackupListResponse = {
      backups: records.map((r) => container.backupService.summarize(r)),
    };
    return json(body);
  });

  const activity: Handler = authed(async (req, ctx) => {
    const entity = await container.entityService.getEditable(pathParam(req, 1), requireActor(ctx));
    const entries = await container.activityService.list(entity.id);

    return json({ activity: entries });
  });

  // deleteAfter goes through readFlag, which also takes "true"/"false"/"1"/"0".
  const restore: Handler = authed(async (req, ctx) => {
    const record = await loadBackup(pathParam(req, 1), requireActor(ctx));
    const body = await readJsonObject(req);

    const result = await container.backupService.restore(
      record.backupId,
      readFlag(body.deleteAfter, 'deleteAfter') ?? false
    );
    return json(result, result.success ? 200 : 500);
  });

  const remove: Handler = authed(async (req, ctx) => {
    const record = await loadBackup(pathParam(req, 0), requireActor(ctx));
    await container.backupService.delete(record.backupId);

    return new Response(null, { status: 204 });
  });

  const sweep: Handler = authed(async (_req, ctx) => {
    if (!canAdminister(requireActor(ctx))) {
      throw new ForbiddenError('Only administrators can run the retention sweep');
    }
    const result = await container.backupService.sweepRetention();
    return json(result);
  });

  return { list, activity, restore, delete: remove, sweep };
}
