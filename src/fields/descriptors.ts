/**
 * Field descriptor parsing.
 * Field groups are stored as JSON; this turns each stored descriptor into the
 * closed FieldDescriptor union and rejects anything it cannot classify.
 */

import { SchemaError } from '../errors.js';
import { isValueMap } from './values.js';
import type {
  FieldDescriptor,
  FieldGroup,
  FieldTypeTag,
  LayoutDescriptor,
  TextFormat,
} from '../types/models.js';

const TYPE_TAGS: readonly FieldTypeTag[] = [
  'scalar-text',
  'scalar-number',
  'choice',
  'boolean',
  'attachment-single',
  'attachment-multi',
  'row-repeater',
  'fixed-group',
  'multi-layout-container',
  'entity-reference',
  'term-reference',
  'user-reference',
  'non-cloneable',
];

interface TypeAlias {
  type: FieldTypeTag;
  format?: TextFormat;
  multiple?: boolean;
}

/** Field-builder type names accepted on import, mapped onto type tags. */
const TYPE_ALIASES: Record<string, TypeAlias> = {
  text: { type: 'scalar-text', format: 'plain' },
  textarea: { type: 'scalar-text', format: 'plain' },
  wysiwyg: { type: 'scalar-text', format: 'plain' },
  email: { type: 'scalar-text', format: 'email' },
  url: { type: 'scalar-text', format: 'url' },
  number: { type: 'scalar-number' },
  range: { type: 'scalar-number' },
  select: { type: 'choice', multiple: false },
  radio: { type: 'choice', multiple: false },
  button_group: { type: 'choice', multiple: false },
  checkbox: { type: 'choice', multiple: true },
  true_false: { type: 'boolean' },
  image: { type: 'attachment-single' },
  file: { type: 'attachment-single' },
  gallery: { type: 'attachment-multi' },
  repeater: { type: 'row-repeater' },
  group: { type: 'fixed-group' },
  flexible_content: { type: 'multi-layout-container' },
  post_object: { type: 'entity-reference', multiple: false },
  page_link: { type: 'entity-reference', multiple: false },
  relationship: { type: 'entity-reference', multiple: true },
  taxonomy: { type: 'term-reference' },
  user: { type: 'user-reference' },
  message: { type: 'non-cloneable' },
  tab: { type: 'non-cloneable' },
  accordion: { type: 'non-cloneable' },
};

type RawObject = { [key: string]: unknown };

export function parseFieldGroup(raw: {
  key: string;
  title: string;
  fields: unknown;
}): FieldGroup {
  if (!Array.isArray(raw.fields)) {
    throw new SchemaError(`Field group "${raw.key}" has no field list`);
  }
  return {
    key: raw.key,
    title: raw.title,
    fields: raw.fields.map((f, i) => parseFieldDescriptor(f, `${raw.key}.fields[${i}]`)),
  };
}

export function parseFieldDescriptor(raw: unknown, path = 'field'): FieldDescriptor {
  if (!isRecord(raw)) {
    throw new SchemaError(`${path}: descriptor must be an object`);
  }

  const key = requireString(raw, 'key', path);
  const base = {
    key,
    name: requireString(raw, 'name', path),
    label: typeof raw.label === 'string' ? raw.label : key,
    required: raw.required === true,
  };
  const here = `${path}(${key})`;
  const { type, format, multiple } = resolveType(raw.type, here);

  switch (type) {
    case 'scalar-text':
      return { ...base, type, format: format ?? readFormat(raw.format, here) };
    case 'scalar-number':
      return {
        ...base,
        type,
        ...(typeof raw.min === 'number' && { min: raw.min }),
        ...(typeof raw.max === 'number' && { max: raw.max }),
      };
    case 'choice':
      return {
        ...base,
        type,
        choices: readChoices(raw.choices),
        multiple: multiple ?? raw.multiple === true,
      };
    case 'boolean':
    case 'attachment-single':
    case 'attachment-multi':
    case 'non-cloneable':
      return { ...base, type };
    case 'row-repeater':
    case 'fixed-group':
      return { ...base, type, subFields: readSubFields(raw.subFields ?? raw.sub_fields, here) };
    case 'multi-layout-container':
      return { ...base, type, layouts: readLayouts(raw.layouts, here) };
    case 'entity-reference':
    case 'user-reference':
      return { ...base, type, multiple: multiple ?? raw.multiple === true };
    case 'term-reference':
      return {
        ...base,
        type,
        taxonomy: requireString(raw, 'taxonomy', here),
        multiple: multiple ?? raw.multiple === true,
      };
  }
}

/** Depth-first search for a descriptor by key, through composite sub-fields and layouts. */
export function findDescriptor(
  fields: readonly FieldDescriptor[],
  key: string
): FieldDescriptor | null {
  for (const field of fields) {
    if (field.key === key) return field;
    const nested = childDescriptors(field);
    if (nested.length > 0) {
      const hit = findDescriptor(nested, key);
      if (hit) return hit;
    }
  }
  return null;
}

export function childDescriptors(field: FieldDescriptor): FieldDescriptor[] {
  switch (field.type) {
    case 'row-repeater':
    case 'fixed-group':
      return field.subFields;
    case 'multi-layout-container':
      return field.layouts.flatMap((l) => l.subFields);
    default:
      return [];
  }
}

// ── Private ──

function isRecord(value: unknown): value is RawObject {
  return isValueMap(value);
}

function requireString(raw: RawObject, prop: string, path: string): string {
  const value = raw[prop];
  if (typeof value !== 'string' || value.length === 0) {
    throw new SchemaError(`${path}: "${prop}" must be a non-empty string`);
  }
  return value;
}

function resolveType(raw: unknown, path: string): TypeAlias {
  if (typeof raw !== 'string') {
    throw new SchemaError(`${path}: "type" must be a string`);
  }
  const tag = TYPE_TAGS.find((t) => t === raw);
  if (tag) return { type: tag };

  const alias = TYPE_ALIASES[raw];
  if (alias) return alias;

  throw new SchemaError(`${path}: unknown field type "${raw}"`);
}

function readFormat(raw: unknown, path: string): TextFormat {
  if (raw === undefined || raw === 'plain') return 'plain';
  if (raw === 'email' || raw === 'url') return raw;
  throw new SchemaError(`${path}: unknown text format "${String(raw)}"`);
}

function readChoices(raw: unknown): string[] {
  if (Array.isArray(raw)) return raw.filter((c): c is string => typeof c === 'string');
  if (isRecord(raw)) return Object.keys(raw);
  return [];
}

function readSubFields(raw: unknown, path: string): FieldDescriptor[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw new SchemaError(`${path}: sub-fields must be a list`);
  }
  return raw.map((f, i) => parseFieldDescriptor(f, `${path}.subFields[${i}]`));
}

function readLayouts(raw: unknown, path: string): LayoutDescriptor[] {
  if (raw === undefined) return [];
  const list = Array.isArray(raw) ? raw : isRecord(raw) ? Object.values(raw) : null;
  if (!list) {
    throw new SchemaError(`${path}: layouts must be a list`);
  }
  return list.map((layout, i) => {
    const at = `${path}.layouts[${i}]`;
    if (!isRecord(layout)) {
      throw new SchemaError(`${at}: layout must be an object`);
    }
    const name = requireString(layout, 'name', at);
    return {
      name,
      label: typeof layout.label === 'string' ? layout.label : name,
      subFields: readSubFields(layout.subFields ?? layout.sub_fields, at),
    };
  });
}
