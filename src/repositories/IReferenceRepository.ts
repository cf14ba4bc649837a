/**
 * Read-only existence checks for values that point at other records.
 */

export interface IReferenceRepository {
  /** True when the id resolves to an attachment entity. */
  isAttachment(id: string): Promise<boolean>;

  entityExists(id: string): Promise<boolean>;

  taxonomyExists(taxonomy: string): Promise<boolean>;

  termExists(taxonomy: string, termId: string): Promise<boolean>;

  userExists(id: string): Promise<boolean>;
}
