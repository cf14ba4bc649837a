/**
 * Read-only operations behind the clone UI: source candidates, the field
 * preview for a source/target pair, and selection validation.
 */

import type { IEntityRepository } from '../repositories/IEntityRepository.js';
import type { AppConfig } from '../config.js';
import type { Actor, Entity, ResolvedField } from '../types/models.js';
import type {
  PreviewField,
  PreviewFieldGroup,
  PreviewFieldsResponse,
  SourceCandidate,
  SourceCandidatesResponse,
  ValidateSelectionResponse,
} from '../types/api.js';
import type { FieldSchemaWalker } from './FieldSchemaWalker.js';
import type { ConflictAnalyzer } from './ConflictAnalyzer.js';
import type { EntityService } from './EntityService.js';
import { summarizeReport } from './FieldSchemaWalker.js';
import { canEdit } from './capabilities.js';
import { rowToEntity } from './entities.js';
import { ForbiddenError, ValidationError } from '../errors.js';
import { describeValue } from '../fields/values.js';

const PREVIEW_WORDS = 8;

export class PreviewService {
  constructor(
    private readonly entityRepo: IEntityRepository,
    private readonly entityService: EntityService,
    private readonly walker: FieldSchemaWalker,
    private readonly analyzer: ConflictAnalyzer,
    private readonly config: AppConfig
  ) {}

  async listSourceCandidates(
    schemaId: string,
    excludeEntityId: string | undefined,
    actor: Actor
  ): Promise<SourceCandidatesResponse> {
    this.requireEnabled(schemaId);

    const rows = await this.entityRepo.findBySchema(schemaId, {
      excludeId: excludeEntityId,
      limit: this.config.maxSourceCandidates,
    });

    const candidates: SourceCandidate[] = [];
    for (const row of rows) {
      const entity = rowToEntity(row);
      if (!canEdit(actor, entity)) continue;

      const stats = await this.walker.getStatistics(entity.id);
      candidates.push({
        entityId: entity.id,
        title: entity.title,
        status: entity.status,
        modifiedAt: entity.modifiedAt.toISOString(),
        fieldCount: stats.totalFields,
        stats,
      });
    }

    return { candidates, total: candidates.length };
  }

  async previewFields(
    sourceEntityId: string,
    targetEntityId: string,
    actor: Actor
  ): Promise<PreviewFieldsResponse> {
    const { source, target } = await this.loadPair(sourceEntityId, targetEntityId, actor);
    const sourceReport = await this.walker.getAvailableFields(source.id);
    const targetReport = await this.walker.getAvailableFields(target.id);

    const fields: PreviewFieldGroup[] = [];
    for (const group of sourceReport.groups) {
      const previews = group.fields
        .filter((f) => f.isCloneable)
        .map((f) => toPreviewField(f, targetReport.fields.get(f.descriptor.key)?.hasValue === true));

      if (previews.length > 0) {
        fields.push({ key: group.key, title: group.title, fields: previews });
      }
    }

    return {
      fields,
      source: { id: source.id, title: source.title, stats: summarizeReport(sourceReport) },
      target: { id: target.id, title: target.title, stats: summarizeReport(targetReport) },
      warnings: sourceReport.warnings,
    };
  }

  async validateSelection(
    sourceEntityId: string,
    targetEntityId: string,
    fieldKeys: readonly string[],
    actor: Actor
  ): Promise<ValidateSelectionResponse> {
    const { source, target } = await this.loadPair(sourceEntityId, targetEntityId, actor);
    const sourceReport = await this.walker.getAvailableFields(source.id);
    const targetReport = await this.walker.getAvailableFields(target.id);

    return this.analyzer.analyze(sourceReport, targetReport, fieldKeys);
  }

  // ── Private ──

  private async loadPair(
    sourceEntityId: string,
    targetEntityId: string,
    actor: Actor
  ): Promise<{ source: Entity; target: Entity }> {
    const source = await this.entityService.getById(sourceEntityId);
    const target = await this.entityService.getById(targetEntityId);

    if (source.schemaId !== target.schemaId) {
      throw new ValidationError('Source and target entities must share the same schema');
    }
    this.requireEnabled(target.schemaId);
    if (!canEdit(actor, target)) {
      throw new ForbiddenError('You do not have permission to edit the target entity');
    }

    return { source, target };
  }

  private requireEnabled(schemaId: string): void {
    if (!this.config.enabledSchemas.includes(schemaId)) {
      throw new ValidationError(`Cloning is not enabled for schema "${schemaId}"`);
    }
  }
}

function toPreviewField(field: ResolvedField, targetHasValue: boolean): PreviewField {
  const { descriptor, stats } = field;
  return {
    key: descriptor.key,
    name: descriptor.name,
    label: descriptor.label,
    type: descriptor.type,
    hasValue: field.hasValue,
    targetHasValue,
    isCloneable: field.isCloneable,
    conflictWarning: field.hasValue && targetHasValue,
    preview: previewText(field),
    ...(stats?.rowCount !== undefined && { rowCount: stats.rowCount }),
    ...(stats?.subFieldCount !== undefined && { subFieldCount: stats.subFieldCount }),
    ...(stats?.instanceCount !== undefined && { layoutCount: stats.instanceCount }),
  };
}

/** Short human-readable summary of a field's value. */
export function previewText(field: ResolvedField): string {
  const { descriptor, value, stats } = field;
  if (!field.hasValue) return '(empty)';

  switch (descriptor.type) {
    case 'row-repeater':
      return `${stats?.rowCount ?? 0} row(s)`;
    case 'fixed-group':
      return `${stats?.subFieldCount ?? 0} sub-field(s)`;
    case 'multi-layout-container':
      return `${stats?.instanceCount ?? 0} layout(s)`;
    case 'boolean':
      return value === true ? 'Yes' : 'No';
    default:
      break;
  }

  if (Array.isArray(value)) return `${value.length} item(s)`;

  const words = describeValue(value).trim().split(/\s+/);
  return words.length > PREVIEW_WORDS
    ? `${words.slice(0, PREVIEW_WORDS).join(' ')}...`
    : words.join(' ');
}
