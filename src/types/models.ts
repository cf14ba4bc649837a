/**
 * Domain models: core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Field Values ──

/** A stored field value. Values are JSON documents; their shape depends on the field type. */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export type FieldValueMap = { [key: string]: FieldValue };

// ── Field Descriptors ──

export type TextFormat = 'plain' | 'email' | 'url';

interface BaseFieldDescriptor {
  /** Globally unique field key, e.g. "field_5f1a2b". */
  key: string;
  /** Storage name; sub-field values are keyed by this inside composite values. */
  name: string;
  label: string;
  required: boolean;
}

export interface TextFieldDescriptor extends BaseFieldDescriptor {
  type: 'scalar-text';
  format: TextFormat;
}

export interface NumberFieldDescriptor extends BaseFieldDescriptor {
  type: 'scalar-number';
  min?: number;
  max?: number;
}

export interface ChoiceFieldDescriptor extends BaseFieldDescriptor {
  type: 'choice';
  choices: string[];
  multiple: boolean;
}

export interface BooleanFieldDescriptor extends BaseFieldDescriptor {
  type: 'boolean';
}

export interface AttachmentFieldDescriptor extends BaseFieldDescriptor {
  type: 'attachment-single' | 'attachment-multi';
}

export interface RepeaterFieldDescriptor extends BaseFieldDescriptor {
  type: 'row-repeater';
  subFields: FieldDescriptor[];
}

export interface GroupFieldDescriptor extends BaseFieldDescriptor {
  type: 'fixed-group';
  subFields: FieldDescriptor[];
}

export interface LayoutDescriptor {
  name: string;
  label: string;
  subFields: FieldDescriptor[];
}

export interface LayoutContainerFieldDescriptor extends BaseFieldDescriptor {
  type: 'multi-layout-container';
  layouts: LayoutDescriptor[];
}

export interface EntityReferenceFieldDescriptor extends BaseFieldDescriptor {
  type: 'entity-reference';
  multiple: boolean;
}

export interface TermReferenceFieldDescriptor extends BaseFieldDescriptor {
  type: 'term-reference';
  taxonomy: string;
  multiple: boolean;
}

export interface UserReferenceFieldDescriptor extends BaseFieldDescriptor {
  type: 'user-reference';
  multiple: boolean;
}

/** Display-only and layout-only markers (messages, tabs, accordions). */
export interface NonCloneableFieldDescriptor extends BaseFieldDescriptor {
  type: 'non-cloneable';
}

export type FieldDescriptor =
  | TextFieldDescriptor
  | NumberFieldDescriptor
  | ChoiceFieldDescriptor
  | BooleanFieldDescriptor
  | AttachmentFieldDescriptor
  | RepeaterFieldDescriptor
  | GroupFieldDescriptor
  | LayoutContainerFieldDescriptor
  | EntityReferenceFieldDescriptor
  | TermReferenceFieldDescriptor
  | UserReferenceFieldDescriptor
  | NonCloneableFieldDescriptor;

export type FieldTypeTag = FieldDescriptor['type'];

export interface FieldGroup {
  key: string;
  title: string;
  fields: FieldDescriptor[];
}

// ── Entities & Actors ──

export interface Entity {
  id: string;
  schemaId: string;
  title: string;
  status: string;
  ownerId: string | null;
  modifiedAt: Date;
}

export type ActorRole = 'administrator' | 'editor' | 'author' | 'contributor';

export interface Actor {
  id: string;
  apiKeyHash: string;
  displayName: string;
  role: ActorRole;
  createdAt: Date;
}

// ── Field Reports ──

export interface StructuralStats {
  rowCount?: number;
  subFieldCount?: number;
  /** Number of configured layouts. */
  layoutCount?: number;
  /** Number of layout entries present in the value. */
  instanceCount?: number;
}

export interface ResolvedLayoutInstance {
  layoutName: string;
  fields: ResolvedField[];
}

export interface ResolvedField {
  descriptor: FieldDescriptor;
  value: FieldValue;
  hasValue: boolean;
  isCloneable: boolean;
  stats?: StructuralStats;
  /** Row-repeater: sub-fields resolved per row. */
  rows?: ResolvedField[][];
  /** Fixed-group: sub-fields resolved once. */
  subFields?: ResolvedField[];
  /** Multi-layout container: one entry per matched layout instance. */
  layouts?: ResolvedLayoutInstance[];
}

export interface ResolvedFieldGroup {
  key: string;
  title: string;
  fields: ResolvedField[];
}

export interface AvailableFieldsReport {
  entityId: string;
  schemaId: string;
  groups: ResolvedFieldGroup[];
  fields: ReadonlyMap<string, ResolvedField>;
  warnings: string[];
}

export interface FieldStatistics {
  totalGroups: number;
  totalFields: number;
  cloneableFields: number;
  repeaterFields: number;
  groupFields: number;
  fieldsWithValues: number;
}

// ── Cloning ──

export interface CloneOptions {
  overwriteExisting: boolean;
  createBackup: boolean;
  copyReferences: boolean;
  validateData: boolean;
}

export interface CloneOutcome {
  clonedFields: string[];
  errors: string[];
  warnings: string[];
  success: boolean;
  message: string;
  backupId: string | null;
}

export interface FieldConflict {
  fieldKey: string;
  fieldLabel: string;
  fieldType: FieldTypeTag;
}

export interface SelectionAnalysis {
  validFields: string[];
  conflicts: FieldConflict[];
  warnings: string[];
  hasConflicts: boolean;
  canProceed: boolean;
}

// ── Backups ──

export interface BackupFieldSnapshot {
  value: FieldValue;
  label: string;
  type: FieldTypeTag;
}

export interface BackupRecord {
  backupId: string;
  targetEntityId: string;
  actorId: string;
  createdAt: Date;
  fields: Record<string, BackupFieldSnapshot>;
}

export interface RestoreResult {
  success: boolean;
  message: string;
  restoredFields: string[];
  errors: string[];
}

export interface SweepResult {
  deletedByAge: number;
  deletedByCount: number;
}
