/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  FieldConflict,
  FieldStatistics,
  FieldTypeTag,
} from './models.js';

// ── Responses ──

export interface SourceCandidate {
  entityId: string;
  title: string;
  status: string;
  modifiedAt: string;
  fieldCount: number;
  stats: FieldStatistics;
}

export interface SourceCandidatesResponse {
  candidates: SourceCandidate[];
  total: number;
}

export interface PreviewField {
  key: string;
  name: string;
  label: string;
  type: FieldTypeTag;
  hasValue: boolean;
  targetHasValue: boolean;
  isCloneable: boolean;
  conflictWarning: boolean;
  preview: string;
  rowCount?: number;
  subFieldCount?: number;
  layoutCount?: number;
}

export interface PreviewFieldGroup {
  key: string;
  title: string;
  fields: PreviewField[];
}

export interface EntitySummary {
  id: string;
  title: string;
  stats: FieldStatistics;
}

export interface PreviewFieldsResponse {
  fields: PreviewFieldGroup[];
  source: EntitySummary;
  target: EntitySummary;
  warnings: string[];
}

export interface ValidateSelectionResponse {
  validFields: string[];
  conflicts: FieldConflict[];
  warnings: string[];
  hasConflicts: boolean;
  canProceed: boolean;
}

export interface BackupSummary {
  backupId: string;
  targetEntityId: string;
  actorId: string;
  createdAt: string;
  fieldCount: number;
  fieldKeys: string[];
}

export interface BackupListResponse {
  backups: BackupSummary[];
}

export interface ActivityEntry {
  sourceEntityId: string;
  sourceTitle: string;
  fieldsCloned: number;
  success: boolean;
  actorId: string;
  createdAt: string;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'BACKUP_FAILED'
  | 'INVALID_SCHEMA'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
