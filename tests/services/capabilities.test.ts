import { describe, it, expect } from 'vitest';
import { canAdminister, canEdit } from '../../src/services/capabilities.js';
import type { Entity } from '../../src/types/models.js';
import { makeActor } from '../fixtures/harness.js';

function entity(ownerId: string | null): Entity {
  return {
    id: 'E',
    schemaId: 'post',
    title: 'E',
    status: 'publish',
    ownerId,
    modifiedAt: new Date('2026-01-01T00:00:00.000Z'),
  };
}

describe('capabilities', () => {
  it('lets administrators and editors edit anything', () => {
    expect(canEdit(makeActor('administrator'), entity(null))).toBe(true);
    expect(canEdit(makeActor('editor'), entity('someone'))).toBe(true);
  });

  it('limits authors and contributors to their own entities', () => {
    expect(canEdit(makeActor('author', 'a1'), entity('a1'))).toBe(true);
    expect(canEdit(makeActor('author', 'a1'), entity('a2'))).toBe(false);
    expect(canEdit(makeActor('contributor', 'c1'), entity(null))).toBe(false);
  });

  it('reserves administration for administrators', () => {
    expect(canAdminister(makeActor('administrator'))).toBe(true);
    expect(canAdminister(makeActor('editor'))).toBe(false);
  });
});
