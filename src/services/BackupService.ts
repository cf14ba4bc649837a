/**
 * Point-in-time snapshots of target field values, taken before a clone
 * overwrites them.
 *
 * Backup ids have the form `backup_{targetEntityId}_{unixSeconds}_{8 hex}`.
 * The random suffix keeps concurrent creates for the same target apart.
 *
 * Retention runs two independent rules after every create: an age cutoff
 * (`retentionDays`) and a global count cap (`maxCount`, oldest deleted first).
 * Either is disabled by setting it to 0.
 */

import { randomBytes } from 'node:crypto';
import type { IBackupRepository } from '../repositories/IBackupRepository.js';
import type { IFieldValueRepository } from '../repositories/IFieldValueRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { BackupConfig } from '../config.js';
import type { BackupFieldData, BackupRow } from '../types/database.js';
import type { BackupRecord, RestoreResult, SweepResult } from '../types/models.js';
import type { BackupSummary } from '../types/api.js';
import type { FieldSchemaWalker } from './FieldSchemaWalker.js';
import { BackupError } from '../errors.js';

const BACKUP_ID_PATTERN = /^backup_(.+)_(\d+)_([0-9a-f]{8})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export class BackupService {
  constructor(
    private readonly backupRepo: IBackupRepository,
    private readonly fieldValueRepo: IFieldValueRepository,
    private readonly walker: FieldSchemaWalker,
    private readonly logProvider: ILogProvider,
    private readonly config: BackupConfig
  ) {}

  /**
   * Snapshot the target's current values for the given keys.
   * Only keys that currently hold a value are captured; returns null when none do.
   * Throws BackupError when the snapshot cannot be stored.
   */
  async create(
    targetEntityId: string,
    fieldKeys: readonly string[],
    actorId: string
  ): Promise<string | null> {
    const report = await this.walker.refresh(targetEntityId);
    const snapshot: Record<string, BackupFieldData> = {};

    for (const key of fieldKeys) {
      const field = report.fields.get(key);
      if (!field?.hasValue) continue;
      snapshot[key] = {
        value: field.value,
        label: field.descriptor.label,
        type: field.descriptor.type,
      };
    }

    const fieldCount = Object.keys(snapshot).length;
    if (fieldCount === 0) return null;

    const backupId = generateBackupId(targetEntityId);

    try {
      await this.backupRepo.insert({
        backup_id: backupId,
        target_entity_id: targetEntityId,
        actor_id: actorId,
        backup_data: snapshot,
        created_at: new Date().toISOString(),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logProvider.error('backup create failed', { targetEntityId, error: message });
      throw new BackupError(`Could not store backup: ${message}`, { targetEntityId });
    }

    this.logProvider.info('backup created', { backupId, targetEntityId, fieldCount });

    await this.sweepRetention();
    return backupId;
  }

  /**
   * Write every snapshot value back verbatim. Field failures are collected and
   * do not stop the remaining fields. With `deleteAfter`, the record is removed
   * only when every field was restored.
   */
  async restore(backupId: string, deleteAfter = false): Promise<RestoreResult> {
    if (!isBackupId(backupId)) {
      return failedRestore('Invalid backup ID format');
    }

    const row = await this.backupRepo.findById(backupId);
    if (!row) {
      return failedRestore('Backup not found');
    }

    const restoredFields: string[] = [];
    const errors: string[] = [];

    for (const [key, field] of Object.entries(row.backup_data)) {
      try {
        await this.fieldValueRepo.set(row.target_entity_id, key, field.value);
        restoredFields.push(key);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        errors.push(`Failed to restore field ${field.label}: ${message}`);
      }
    }

    this.walker.clearCache(row.target_entity_id);

    const success = errors.length === 0;
    if (deleteAfter && success) {
      await this.backupRepo.delete(backupId);
    }

    this.logProvider.info('backup restored', {
      backupId,
      targetEntityId: row.target_entity_id,
      restored: restoredFields.length,
      errors: errors.length,
    });

    return {
      success,
      message: success
        ? `Restored ${restoredFields.length} field(s)`
        : `Restored ${restoredFields.length} field(s) with ${errors.length} error(s)`,
      restoredFields,
      errors,
    };
  }

  async delete(backupId: string): Promise<boolean> {
    if (!isBackupId(backupId)) return false;
    return this.backupRepo.delete(backupId);
  }

  async get(backupId: string): Promise<BackupRecord | null> {
    if (!isBackupId(backupId)) return null;
    const row = await this.backupRepo.findById(backupId);
    return row ? rowToRecord(row) : null;
  }

  /** Backups of one entity, newest first. */
  async list(targetEntityId: string): Promise<BackupRecord[]> {
    const rows = await this.backupRepo.findByTarget(targetEntityId);
    return rows.map(rowToRecord);
  }

  summarize(record: BackupRecord): BackupSummary {
    const fieldKeys = Object.keys(record.fields);
    return {
      backupId: record.backupId,
      targetEntityId: record.targetEntityId,
      actorId: record.actorId,
      createdAt: record.createdAt.toISOString(),
      fieldCount: fieldKeys.length,
      fieldKeys,
    };
  }

  /**
   * Apply both retention rules. A failing rule is logged and reported as zero
   * deletions; it never prevents the other rule from running.
   */
  async sweepRetention(): Promise<SweepResult> {
    const result: SweepResult = { deletedByAge: 0, deletedByCount: 0 };

    if (this.config.retentionDays > 0) {
      try {
        const cutoff = new Date(Date.now() - this.config.retentionDays * DAY_MS);
        result.deletedByAge = await this.backupRepo.deleteOlderThan(cutoff);
      } catch (err) {
        this.logProvider.error('backup age sweep failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (this.config.maxCount > 0) {
      try {
        const total = await this.backupRepo.count();
        if (total > this.config.maxCount) {
          const excess = await this.backupRepo.findOldest(total - this.config.maxCount);
          result.deletedByCount = await this.backupRepo.deleteMany(
            excess.map((r) => r.backup_id)
          );
        }
      } catch (err) {
        this.logProvider.error('backup count sweep failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (result.deletedByAge > 0 || result.deletedByCount > 0) {
      this.logProvider.info('backup retention sweep', { ...result });
    }

    return result;
  }
}

export function isBackupId(value: string): boolean {
  return BACKUP_ID_PATTERN.test(value);
}

function generateBackupId(targetEntityId: string): string {
  const seconds = Math.floor(Date.now() / 1000);
  return `backup_${targetEntityId}_${seconds}_${randomBytes(4).toString('hex')}`;
}

function failedRestore(message: string): RestoreResult {
  return { success: false, message, restoredFields: [], errors: [message] };
}

function rowToRecord(row: BackupRow): BackupRecord {
  return {
    backupId: row.backup_id,
    targetEntityId: row.target_entity_id,
    actorId: row.actor_id,
    createdAt: new Date(row.created_at),
    fields: row.backup_data,
  };
}
