/**
 * Builds the available-fields report for an entity.
 *
 * For every field group of the entity's schema, each descriptor is resolved
 * against the stored value. Fields without a value are left out, except
 * repeaters and groups, which are always listed so their structure can be
 * previewed. Composite values are resolved recursively.
 *
 * Reports are cached per entity id for the lifetime of the walker, which the
 * production container scopes to one request. Anything that writes an entity's
 * fields must call clearCache(entityId) before returning; a schema change calls
 * clearCache() with no argument. Callers about to write use refresh(), so a
 * decision to overwrite never rests on a cached report.
 */

import type { IEntityRepository } from '../repositories/IEntityRepository.js';
import type { ISchemaRepository } from '../repositories/ISchemaRepository.js';
import type { IFieldValueRepository } from '../repositories/IFieldValueRepository.js';
import type {
  AvailableFieldsReport,
  FieldDescriptor,
  FieldStatistics,
  FieldTypeTag,
  FieldValue,
  ResolvedField,
  ResolvedFieldGroup,
  ResolvedLayoutInstance,
} from '../types/models.js';
import { NotFoundError } from '../errors.js';
import { LAYOUT_DISCRIMINATOR, describeValue, hasValue, isValueMap } from '../fields/values.js';

const ALWAYS_LISTED: ReadonlySet<FieldTypeTag> = new Set(['row-repeater', 'fixed-group']);

export class FieldSchemaWalker {
  private readonly cache = new Map<string, AvailableFieldsReport>();

  constructor(
    private readonly entityRepo: IEntityRepository,
    private readonly schemaRepo: ISchemaRepository,
    private readonly fieldValueRepo: IFieldValueRepository
  ) {}

  async getAvailableFields(entityId: string): Promise<AvailableFieldsReport> {
    const cached = this.cache.get(entityId);
    if (cached) return cached;

    const entity = await this.entityRepo.findById(entityId);
    if (!entity) {
      throw new NotFoundError(`Entity "${entityId}" not found`);
    }

    const schemaGroups = await this.schemaRepo.getFieldGroups(entity.schema_id);
    const warnings = new Set<string>();
    const fields = new Map<string, ResolvedField>();
    const groups: ResolvedFieldGroup[] = [];

    for (const group of schemaGroups) {
      const listed: ResolvedField[] = [];

      for (const descriptor of group.fields) {
        const value = await this.fieldValueRepo.get(entityId, descriptor.key);
        if (!hasValue(value) && !ALWAYS_LISTED.has(descriptor.type)) continue;

        const resolved = resolveField(descriptor, value, warnings);
        listed.push(resolved);
        fields.set(descriptor.key, resolved);
      }

      if (listed.length > 0) {
        groups.push({ key: group.key, title: group.title, fields: listed });
      }
    }

    const report: AvailableFieldsReport = {
      entityId,
      schemaId: entity.schema_id,
      groups,
      fields,
      warnings: [...warnings],
    };

    this.cache.set(entityId, report);
    return report;
  }

  async getStatistics(entityId: string): Promise<FieldStatistics> {
    const report = await this.getAvailableFields(entityId);
    return summarizeReport(report);
  }

  /** A top-level field from the entity's report, or null when it is not listed. */
  async findField(entityId: string, fieldKey: string): Promise<ResolvedField | null> {
    const report = await this.getAvailableFields(entityId);
    return report.fields.get(fieldKey) ?? null;
  }

  /** Rebuild the entity's report from storage, replacing any cached one. */
  async refresh(entityId: string): Promise<AvailableFieldsReport> {
    this.cache.delete(entityId);
    return this.getAvailableFields(entityId);
  }

  /** Drop one entity's report, or every report when no id is given. */
  clearCache(entityId?: string): void {
    if (entityId === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(entityId);
    }
  }
}

export function summarizeReport(report: AvailableFieldsReport): FieldStatistics {
  const stats: FieldStatistics = {
    totalGroups: report.groups.length,
    totalFields: report.fields.size,
    cloneableFields: 0,
    repeaterFields: 0,
    groupFields: 0,
    fieldsWithValues: 0,
  };

  for (const field of report.fields.values()) {
    if (field.isCloneable) stats.cloneableFields++;
    if (field.descriptor.type === 'row-repeater') stats.repeaterFields++;
    if (field.descriptor.type === 'fixed-group') stats.groupFields++;
    if (field.hasValue) stats.fieldsWithValues++;
  }

  return stats;
}

// ── Resolution ──

function resolveField(
  descriptor: FieldDescriptor,
  value: FieldValue,
  warnings: Set<string>
): ResolvedField {
  const base: ResolvedField = {
    descriptor,
    value,
    hasValue: hasValue(value),
    isCloneable: descriptor.type !== 'non-cloneable',
  };

  switch (descriptor.type) {
    case 'row-repeater': {
      const rows = Array.isArray(value) ? value.filter(isValueMap) : [];
      return {
        ...base,
        stats: { rowCount: rows.length, subFieldCount: descriptor.subFields.length },
        rows: rows.map((row) =>
          descriptor.subFields.map((sub) => resolveField(sub, row[sub.name] ?? null, warnings))
        ),
      };
    }

    case 'fixed-group': {
      const map = isValueMap(value) ? value : {};
      return {
        ...base,
        stats: { subFieldCount: descriptor.subFields.length },
        subFields: descriptor.subFields.map((sub) =>
          resolveField(sub, map[sub.name] ?? null, warnings)
        ),
      };
    }

    case 'multi-layout-container': {
      const entries = Array.isArray(value) ? value.filter(isValueMap) : [];
      const layouts: ResolvedLayoutInstance[] = [];

      for (const entry of entries) {
        const name = describeValue(entry[LAYOUT_DISCRIMINATOR] ?? null);
        const layout = descriptor.layouts.find((l) => l.name === name);
        if (!layout) {
          warnings.add(`Layout configuration not found for: ${name}`);
          continue;
        }
        layouts.push({
          layoutName: name,
          fields: layout.subFields.map((sub) =>
            resolveField(sub, entry[sub.name] ?? null, warnings)
          ),
        });
      }

      return {
        ...base,
        stats: { layoutCount: descriptor.layouts.length, instanceCount: entries.length },
        layouts,
      };
    }

    default:
      return base;
  }
}
