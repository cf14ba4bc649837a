import { describe, it, expect, beforeEach } from 'vitest';
import { ActivityService, ACTIVITY_KEEP } from '../../src/services/ActivityService.js';
import type { CloneContext } from '../../src/services/CloneService.js';
import type { CloneOutcome, Entity } from '../../src/types/models.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import { MockActivityRepository } from '../mocks/MockActivityRepository.js';
import { makeActor } from '../fixtures/harness.js';

function entity(id: string): Entity {
  return { id, schemaId: 'post', title: `Title ${id}`, status: 'publish', ownerId: null, modifiedAt: new Date() };
}

const OUTCOME: CloneOutcome = {
  clonedFields: ['price'],
  errors: [],
  warnings: [],
  success: true,
  message: 'Successfully cloned 1 field(s)',
  backupId: null,
};

describe('ActivityService', () => {
  let activity: ActivityService;
  let repo: MockActivityRepository;

  beforeEach(() => {
    repo = new MockActivityRepository();
    activity = new ActivityService(repo);
  });

  function context(sourceId: string, targetId = 'T'): CloneContext {
    return {
      source: entity(sourceId),
      target: entity(targetId),
      fieldKeys: ['price'],
      options: DEFAULT_CONFIG.cloneDefaults,
      actor: makeActor('editor'),
    };
  }

  it('records one entry per clone, newest first', async () => {
    await activity.onAfterClone(context('A'), OUTCOME);
    await activity.onAfterClone(context('B'), { ...OUTCOME, clonedFields: [], success: false });

    const entries = await activity.list('T');

    expect(entries.map((e) => [e.sourceEntityId, e.fieldsCloned, e.success])).toEqual([
      ['B', 0, false],
      ['A', 1, true],
    ]);
    expect(entries[1].sourceTitle).toBe('Title A');
  });

  it('keeps only the newest entries per target', async () => {
    for (let i = 0; i < ACTIVITY_KEEP + 2; i++) {
      await activity.onAfterClone(context(`S${i}`), OUTCOME);
    }
    await activity.onAfterClone(context('other', 'U'), OUTCOME);

    const entries = await activity.list('T');

    expect(entries).toHaveLength(ACTIVITY_KEEP);
    expect(entries[0].sourceEntityId).toBe('S11');
    expect(entries[ACTIVITY_KEEP - 1].sourceEntityId).toBe('S2');
    expect(await activity.list('U')).toHaveLength(1);
  });
});
