/**
 * Shared request-body schema types used by the validateBody middleware.
 */

export type FieldSchemaType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldSchemaType;
  required: boolean;
  /** Strings only. */
  maxLength?: number;
  /** Strings only. */
  enum?: string[];
  /** Numbers only. */
  min?: number;
  max?: number;
  /** Arrays only. */
  minItems?: number;
  maxItems?: number;
  /** Arrays only: element type check. */
  items?: 'string' | 'number';
}

export type BodySchema = Record<string, FieldSchema>;
