import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictAnalyzer } from '../../src/services/ConflictAnalyzer.js';
import { FieldSchemaWalker } from '../../src/services/FieldSchemaWalker.js';
import { MockEntityRepository } from '../mocks/MockEntityRepository.js';
import { MockSchemaRepository } from '../mocks/MockSchemaRepository.js';
import { MockFieldValueRepository } from '../mocks/MockFieldValueRepository.js';
import { POST_GROUPS } from '../fixtures/post-schema.js';

describe('ConflictAnalyzer', () => {
  let analyzer: ConflictAnalyzer;
  let walker: FieldSchemaWalker;
  let fieldValueRepo: MockFieldValueRepository;

  beforeEach(() => {
    const entityRepo = new MockEntityRepository();
    const schemaRepo = new MockSchemaRepository();
    fieldValueRepo = new MockFieldValueRepository();
    walker = new FieldSchemaWalker(entityRepo, schemaRepo, fieldValueRepo);
    analyzer = new ConflictAnalyzer();

    schemaRepo.setGroups('post', POST_GROUPS);
    entityRepo.add({ id: 'S' });
    entityRepo.add({ id: 'T' });
    fieldValueRepo.seed('S', { price: 42, gallery: [10], notice: 'Read me' });
    fieldValueRepo.seed('T', { gallery: [5] });
  });

  async function analyze(keys: string[]) {
    return analyzer.analyze(
      await walker.getAvailableFields('S'),
      await walker.getAvailableFields('T'),
      keys
    );
  }

  it('reports target fields that already hold a value as conflicts', async () => {
    const result = await analyze(['price', 'gallery']);

    expect(result.validFields).toEqual(['price', 'gallery']);
    expect(result.conflicts).toEqual([
      { fieldKey: 'gallery', fieldLabel: 'Gallery', fieldType: 'attachment-multi' },
    ]);
    expect(result.hasConflicts).toBe(true);
    expect(result.canProceed).toBe(true);
  });

  it('warns about keys missing from the source', async () => {
    const result = await analyze(['price', 'subtitle']);

    expect(result.validFields).toEqual(['price']);
    expect(result.warnings).toEqual(['Field subtitle not found in source']);
  });

  it('warns about non-cloneable fields', async () => {
    const result = await analyze(['notice']);

    expect(result.validFields).toEqual([]);
    expect(result.warnings).toEqual(['Field Notice (notice) is not cloneable']);
    expect(result.canProceed).toBe(false);
  });

  it('lists an empty repeater as valid without a conflict', async () => {
    const result = await analyze(['slides']);

    expect(result.validFields).toEqual(['slides']);
    expect(result.conflicts).toEqual([]);
    expect(result.hasConflicts).toBe(false);
  });

  it('lists a repeated key once', async () => {
    const result = await analyze(['gallery', 'price', 'gallery']);

    expect(result.validFields).toEqual(['gallery', 'price']);
    expect(result.conflicts).toHaveLength(1);
  });
});
