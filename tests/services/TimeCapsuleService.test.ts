import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContext, type TestContext } from '../mocks/TestContainer.js';
import { collect } from '../../src/services/sequence.js';

describe('TimeCapsuleService', () => {
  let t: TestContext;
  let first: string;
  let second: string;

  beforeEach(async () => {
    t = createTestContext();
    const { submissionService, lineageService, outcomeService } = t.container;

    first = await submissionService.create({ ownerId: 'owner-a', text: 'first idea' });
    t.clock.advanceDays(10);
    second = await submissionService.create({ ownerId: 'owner-a', text: 'refined idea' });
    const third = await submissionService.create({ ownerId: 'owner-b', text: 'borrowed idea' });

    await lineageService.link({
      parentId: first,
      childId: second,
      refinementType: 'clarification',
      depthIncrease: 0.4,
    });
    await lineageService.link({
      parentId: second,
      childId: third,
      refinementType: 'expansion',
      depthIncrease: 0.2,
    });
    await outcomeService.recordOutcome(second, { result: 1, source: 'launch' });
  });

  it('should list the owner history oldest first', async () => {
    const entries = await collect(t.container.timeCapsuleService.get('owner-a'));

    expect(entries.map((e) => e.submission.id)).toEqual([first, second]);

    expect(entries[0]).toMatchObject({
      outcome: null,
      accuracyScore: null,
      parent: null,
      childCount: 1,
      inheritedCredit: 0.5,
    });
    expect(entries[0].submission.status).toBe('superseded');

    expect(entries[1].accuracyScore).toBe(1);
    expect(entries[1].outcome?.validationSource).toBe('launch');
    expect(entries[1].parent?.parentId).toBe(first);
    expect(entries[1].childCount).toBe(1);
    expect(entries[1].inheritedCredit).toBe(0);
  });

  it('should filter by since', async () => {
    const entries = await collect(
      t.container.timeCapsuleService.get('owner-a', new Date('2024-01-05T00:00:00.000Z'))
    );
    expect(entries.map((e) => e.submission.id)).toEqual([second]);
  });

  it('should be empty for an unknown owner', async () => {
    expect(await collect(t.container.timeCapsuleService.get('ghost'))).toEqual([]);
  });

  it('should be restartable', async () => {
    const capsule = t.container.timeCapsuleService.get('owner-a');
    const once = await collect(capsule);
    const twice = await collect(capsule);
    expect(twice).toEqual(once);
  });
});
