/**
 * Clone orchestration: validate the request, snapshot the target, then copy
 * each selected field through the transformer and into the target.
 *
 * Request-level problems end the call with a single error. Field-level
 * problems are recorded against that field and the loop moves on, so every
 * requested key ends up in exactly one of `clonedFields` or `errors`.
 */

import type { IEntityRepository } from '../repositories/IEntityRepository.js';
import type { IFieldValueRepository } from '../repositories/IFieldValueRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AppConfig } from '../config.js';
import type { Actor, CloneOptions, CloneOutcome, Entity } from '../types/models.js';
import type { FieldSchemaWalker } from './FieldSchemaWalker.js';
import type { ValueTransformer } from './ValueTransformer.js';
import type { BackupService } from './BackupService.js';
import { canEdit } from './capabilities.js';
import { rowToEntity } from './entities.js';

export interface CloneContext {
  source: Entity;
  target: Entity;
  fieldKeys: readonly string[];
  options: CloneOptions;
  actor: Actor;
}

/** Side effects around a clone. Failures are logged and never change the outcome. */
export interface CloneObserver {
  onBeforeClone?(context: CloneContext): Promise<void> | void;
  onAfterClone?(context: CloneContext, outcome: CloneOutcome): Promise<void> | void;
}

export class CloneService {
  constructor(
    private readonly entityRepo: IEntityRepository,
    private readonly fieldValueRepo: IFieldValueRepository,
    private readonly walker: FieldSchemaWalker,
    private readonly transformer: ValueTransformer,
    private readonly backupService: BackupService,
    private readonly logProvider: ILogProvider,
    private readonly config: AppConfig,
    private readonly observers: readonly CloneObserver[] = []
  ) {}

  async cloneFields(
    sourceEntityId: string,
    targetEntityId: string,
    requestedKeys: readonly string[],
    overrides: Partial<CloneOptions>,
    actor: Actor,
    observer?: CloneObserver
  ): Promise<CloneOutcome> {
    const options: CloneOptions = { ...this.config.cloneDefaults, ...definedOnly(overrides) };
    // Each key is cloned at most once, in the caller's order.
    const fieldKeys = [...new Set(requestedKeys)];

    // ── Validate ──

    const sourceRow = await this.entityRepo.findById(sourceEntityId);
    if (!sourceRow) return rejected('Source entity not found');

    const targetRow = await this.entityRepo.findById(targetEntityId);
    if (!targetRow) return rejected('Target entity not found');

    const source = rowToEntity(sourceRow);
    const target = rowToEntity(targetRow);

    if (source.schemaId !== target.schemaId) {
      return rejected('Source and target entities must share the same schema');
    }
    if (!this.config.enabledSchemas.includes(target.schemaId)) {
      return rejected(`Cloning is not enabled for schema "${target.schemaId}"`);
    }
    if (!canEdit(actor, target)) {
      return rejected('You do not have permission to edit the target entity');
    }
    if (fieldKeys.length === 0) {
      return rejected('No field keys provided for cloning');
    }

    const context: CloneContext = { source, target, fieldKeys, options, actor };
    const observers = observer ? [...this.observers, observer] : this.observers;

    this.logProvider.info('clone started', {
      sourceEntityId,
      targetEntityId,
      fieldCount: fieldKeys.length,
      actorId: actor.id,
    });
    await this.notify(observers, (o) => o.onBeforeClone?.(context));

    const outcome = await this.run(context);

    this.walker.clearCache(target.id);

    const completed = {
      sourceEntityId,
      targetEntityId,
      cloned: outcome.clonedFields.length,
      errors: outcome.errors.length,
      warnings: outcome.warnings.length,
      backupId: outcome.backupId,
    };
    if (outcome.success) {
      this.logProvider.info('clone completed', completed);
    } else {
      this.logProvider.warn('clone completed', completed);
    }

    await this.notify(observers, (o) => o.onAfterClone?.(context, outcome));
    return outcome;
  }

  // ── Private ──

  private async run(context: CloneContext): Promise<CloneOutcome> {
    const { source, target, fieldKeys, options, actor } = context;
    const clonedFields: string[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];
    let backupId: string | null = null;

    if (options.createBackup) {
      try {
        backupId = await this.backupService.create(target.id, fieldKeys, actor.id);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logProvider.error('clone backup failed', {
          targetEntityId: target.id,
          policy: this.config.backup.failurePolicy,
          error: message,
        });
        if (this.config.backup.failurePolicy === 'abort') {
          return summarize([], [`Backup failed: ${message}`], [], null);
        }
        warnings.push(`Backup failed, continuing without one: ${message}`);
      }
    }

    const sourceReport = await this.walker.refresh(source.id);
    const targetReport = await this.walker.refresh(target.id);

    for (const key of fieldKeys) {
      const field = sourceReport.fields.get(key);
      if (!field?.hasValue) {
        errors.push(`Field ${key} not found in source`);
        continue;
      }

      const { descriptor } = field;
      if (!field.isCloneable) {
        errors.push(`Field ${descriptor.label} is not cloneable`);
        continue;
      }

      if (targetReport.fields.get(key)?.hasValue === true && !options.overwriteExisting) {
        errors.push(`Field ${descriptor.label} already has a value and overwrite is disabled`);
        continue;
      }

      try {
        const transformed = await this.transformer.transform(field.value, descriptor, {
          copyReferences: options.copyReferences,
        });

        if (options.validateData) {
          const check = this.transformer.validate(transformed.value, descriptor);
          if (!check.valid) {
            errors.push(`Validation failed for field ${descriptor.label}: ${check.reason ?? 'invalid value'}`);
            continue;
          }
        }

        await this.fieldValueRepo.set(target.id, key, transformed.value);
        clonedFields.push(key);
        warnings.push(...transformed.warnings);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        errors.push(`Failed to update field ${descriptor.label}: ${message}`);
      }
    }

    return summarize(clonedFields, errors, warnings, backupId);
  }

  private async notify(
    observers: readonly CloneObserver[],
    call: (observer: CloneObserver) => Promise<void> | void
  ): Promise<void> {
    for (const observer of observers) {
      try {
        await call(observer);
      } catch (err) {
        this.logProvider.error('clone observer failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

function summarize(
  clonedFields: string[],
  errors: string[],
  warnings: string[],
  backupId: string | null
): CloneOutcome {
  const success = errors.length === 0;
  const warningSuffix = warnings.length > 0 ? ` with ${warnings.length} warning(s)` : '';
  const message = success
    ? `Successfully cloned ${clonedFields.length} field(s)${warningSuffix}`
    : `Cloned ${clonedFields.length} field(s) with ${errors.length} error(s)` +
      (warnings.length > 0 ? ` and ${warnings.length} warning(s)` : '');

  return { clonedFields, errors, warnings, success, message, backupId };
}

function rejected(error: string): CloneOutcome {
  return {
    clonedFields: [],
    errors: [error],
    warnings: [],
    success: false,
    message: error,
    backupId: null,
  };
}

/** Drop keys explicitly set to undefined so they don't mask the defaults. */
function definedOnly(overrides: Partial<CloneOptions>): Partial<CloneOptions> {
  const out: Partial<CloneOptions> = {};
  if (overrides.overwriteExisting !== undefined) out.overwriteExisting = overrides.overwriteExisting;
  if (overrides.createBackup !== undefined) out.createBackup = overrides.createBackup;
  if (overrides.copyReferences !== undefined) out.copyReferences = overrides.copyReferences;
  if (overrides.validateData !== undefined) out.validateData = overrides.validateData;
  return out;
}
