/**
 * Database row types. They mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { FieldValue, FieldTypeTag } from './models.js';

// ── Content ──

export interface EntityRow {
  id: string;
  schema_id: string;
  title: string;
  status: string;
  owner_id: string | null;
  modified_at: string;
}

export interface FieldGroupRow {
  key: string;
  schema_id: string;
  title: string;
  position: number;
  /** Descriptor list as stored; parsed into FieldDescriptor on read. */
  fields: unknown;
}

export interface FieldValueRow {
  entity_id: string;
  field_key: string;
  value: FieldValue;
  updated_at: string;
}

// ── Actors ──

export interface ActorRow {
  id: string;
  api_key_hash: string;
  display_name: string;
  role: string;
  created_at: string;
}

// ── Backups ──

export interface BackupFieldData {
  value: FieldValue;
  label: string;
  type: FieldTypeTag;
}

export interface BackupRow {
  backup_id: string;
  target_entity_id: string;
  actor_id: string;
  /** Serialized snapshot; the store never queries into it. */
  backup_data: Record<string, BackupFieldData>;
  field_count: number;
  created_at: string;
}

// ── Activity ──

export interface CloneActivityRow {
  id: string;
  target_entity_id: string;
  source_entity_id: string;
  source_title: string;
  fields_cloned: number;
  success: boolean;
  actor_id: string;
  created_at: string;
}
