/**
 * Helpers for inspecting stored field values.
 */

import type { FieldValue, FieldValueMap } from '../types/models.js';

/** Key that carries the layout name on each multi-layout container entry. */
export const LAYOUT_DISCRIMINATOR = 'layout';

export function isValueMap(value: unknown): value is FieldValueMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Absent, null, empty string, empty list and empty map count as "no value".
 * Zero and false are values.
 */
export function hasValue(value: FieldValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isValueMap(value)) return Object.keys(value).length > 0;
  return true;
}

/** Narrow an unknown JSON document to FieldValue. */
export function toFieldValue(raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (Array.isArray(raw)) return raw.map(toFieldValue);
  if (typeof raw === 'object') {
    const out: FieldValueMap = {};
    for (const [key, item] of Object.entries(raw)) {
      out[key] = toFieldValue(item);
    }
    return out;
  }
  return null;
}

/**
 * Reference ids are integers or non-empty strings. Numeric strings are kept as
 * written; the lookup side compares by string form.
 */
export type ReferenceId = number | string;

export function asReferenceId(value: FieldValue): ReferenceId | null {
  if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
  if (typeof value === 'string') return value.trim().length > 0 ? value.trim() : null;
  return null;
}

export function describeValue(value: FieldValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
