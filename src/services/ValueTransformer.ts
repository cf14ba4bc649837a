/**
 * Per-type transformation and validation of field values on their way from a
 * source entity to a target.
 *
 * Transformation may look references up but never writes. Unresolvable
 * references are dropped (or nulled, for single attachments) with a warning
 * naming the id; they never fail the field.
 */

import type { IReferenceRepository } from '../repositories/IReferenceRepository.js';
import type {
  FieldDescriptor,
  FieldValue,
  FieldValueMap,
  LayoutContainerFieldDescriptor,
  NumberFieldDescriptor,
  TextFieldDescriptor,
} from '../types/models.js';
import {
  LAYOUT_DISCRIMINATOR,
  asReferenceId,
  describeValue,
  hasValue,
  isValueMap,
} from '../fields/values.js';

export interface TransformOptions {
  /** Verify attachment ids. When false attachments are copied as-is. */
  copyReferences: boolean;
}

export interface TransformResult {
  value: FieldValue;
  warnings: string[];
}

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

type ExistsCheck = (id: string) => Promise<boolean>;
type MissingMessage = (id: string) => string;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class ValueTransformer {
  constructor(private readonly referenceRepo: IReferenceRepository) {}

  async transform(
    value: FieldValue,
    descriptor: FieldDescriptor,
    options: TransformOptions
  ): Promise<TransformResult> {
    const warnings: string[] = [];
    const transformed = await this.transformValue(value, descriptor, options, warnings);
    return { value: transformed, warnings };
  }

  validate(value: FieldValue, descriptor: FieldDescriptor): ValidationResult {
    if (!hasValue(value)) {
      return descriptor.required
        ? { valid: false, reason: 'field is required' }
        : { valid: true };
    }

    switch (descriptor.type) {
      case 'scalar-text':
        return validateText(value, descriptor);
      case 'scalar-number':
        return validateNumber(value, descriptor);
      default:
        return { valid: true };
    }
  }

  // ── Dispatch ──

  private async transformValue(
    value: FieldValue,
    descriptor: FieldDescriptor,
    options: TransformOptions,
    warnings: string[]
  ): Promise<FieldValue> {
    switch (descriptor.type) {
      case 'scalar-text':
      case 'scalar-number':
      case 'choice':
      case 'boolean':
      case 'non-cloneable':
        return value;

      case 'attachment-single':
        if (!options.copyReferences) return value;
        return this.checkAttachment(value, warnings);

      case 'attachment-multi': {
        if (!options.copyReferences) return value;
        if (!Array.isArray(value)) return this.checkAttachment(value, warnings);
        const kept: FieldValue[] = [];
        for (const item of value) {
          const checked = await this.checkAttachment(item, warnings);
          if (checked !== null) kept.push(checked);
        }
        return kept;
      }

      case 'row-repeater': {
        if (!Array.isArray(value)) return value;
        const rows: FieldValue[] = [];
        for (const row of value) {
          rows.push(
            isValueMap(row)
              ? await this.transformMap(row, descriptor.subFields, options, warnings)
              : row
          );
        }
        return rows;
      }

      case 'fixed-group':
        if (!isValueMap(value)) return value;
        return this.transformMap(value, descriptor.subFields, options, warnings);

      case 'multi-layout-container':
        return this.transformLayouts(value, descriptor, options, warnings);

      case 'entity-reference':
        return this.filterReferences(
          value,
          (id) => this.referenceRepo.entityExists(id),
          (id) => `Referenced entity ID ${id} not found`,
          warnings
        );

      case 'term-reference': {
        const { taxonomy } = descriptor;
        if (!(await this.referenceRepo.taxonomyExists(taxonomy))) {
          warnings.push(`Taxonomy ${taxonomy} does not exist`);
          return value;
        }
        return this.filterReferences(
          value,
          (id) => this.referenceRepo.termExists(taxonomy, id),
          (id) => `Term ID ${id} not found in taxonomy ${taxonomy}`,
          warnings
        );
      }

      case 'user-reference':
        return this.filterReferences(
          value,
          (id) => this.referenceRepo.userExists(id),
          (id) => `User ID ${id} not found`,
          warnings
        );
    }
  }

  /** Sub-values are matched by descriptor name; unknown names pass through. */
  private async transformMap(
    map: FieldValueMap,
    subFields: FieldDescriptor[],
    options: TransformOptions,
    warnings: string[]
  ): Promise<FieldValueMap> {
    const out: FieldValueMap = {};
    for (const [name, subValue] of Object.entries(map)) {
      const sub = subFields.find((f) => f.name === name);
      out[name] = sub
        ? await this.transformValue(subValue, sub, options, warnings)
        : subValue;
    }
    return out;
  }

  private async transformLayouts(
    value: FieldValue,
    descriptor: LayoutContainerFieldDescriptor,
    options: TransformOptions,
    warnings: string[]
  ): Promise<FieldValue> {
    if (!Array.isArray(value)) return value;

    const entries: FieldValue[] = [];
    for (const entry of value) {
      if (!isValueMap(entry)) {
        entries.push(entry);
        continue;
      }

      const name = describeValue(entry[LAYOUT_DISCRIMINATOR] ?? null);
      const layout = descriptor.layouts.find((l) => l.name === name);
      if (!layout) {
        warnings.push(`Layout configuration not found for: ${name}`);
        entries.push(entry);
        continue;
      }

      entries.push(await this.transformMap(entry, layout.subFields, options, warnings));
    }
    return entries;
  }

  // ── References ──

  /**
   * Accepts a bare id or an attachment object carrying `id` (or `ID`).
   * Returns null when the attachment no longer exists.
   */
  private async checkAttachment(value: FieldValue, warnings: string[]): Promise<FieldValue> {
    if (value === null) return null;

    const raw = isValueMap(value) ? (value.id ?? value.ID ?? null) : value;
    const id = asReferenceId(raw);
    if (id === null) return value;

    if (await this.referenceRepo.isAttachment(String(id))) return value;

    warnings.push(`Attachment ID ${id} not found`);
    return null;
  }

  private async filterReferences(
    value: FieldValue,
    exists: ExistsCheck,
    missing: MissingMessage,
    warnings: string[]
  ): Promise<FieldValue> {
    if (Array.isArray(value)) {
      const kept: FieldValue[] = [];
      for (const item of value) {
        const id = asReferenceId(item);
        if (id === null || (await exists(String(id)))) {
          kept.push(item);
        } else {
          warnings.push(missing(String(id)));
        }
      }
      return kept;
    }

    const id = asReferenceId(value);
    if (id === null || (await exists(String(id)))) return value;

    warnings.push(missing(String(id)));
    return null;
  }
}

// ── Validation ──

function validateText(value: FieldValue, descriptor: TextFieldDescriptor): ValidationResult {
  if (typeof value !== 'string') {
    return { valid: false, reason: 'value must be text' };
  }

  switch (descriptor.format) {
    case 'email':
      return EMAIL_PATTERN.test(value)
        ? { valid: true }
        : { valid: false, reason: 'invalid email address' };
    case 'url':
      return isHttpUrl(value) ? { valid: true } : { valid: false, reason: 'invalid URL' };
    case 'plain':
      return { valid: true };
  }
}

function validateNumber(value: FieldValue, descriptor: NumberFieldDescriptor): ValidationResult {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    return { valid: false, reason: 'value must be numeric' };
  }
  if (descriptor.min !== undefined && n < descriptor.min) {
    return { valid: false, reason: `value must be at least ${descriptor.min}` };
  }
  if (descriptor.max !== undefined && n > descriptor.max) {
    return { valid: false, reason: `value must be at most ${descriptor.max}` };
  }
  return { valid: true };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
