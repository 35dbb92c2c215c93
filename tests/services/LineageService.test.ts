import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createTestContext, type TestContext } from '../mocks/TestContainer.js';
import { collect } from '../../src/services/sequence.js';
import {
  CycleError,
  MultipleParentError,
  NotFoundError,
  TruncatedError,
  ValidationError,
} from '../../src/errors.js';

describe('LineageService', () => {
  let t: TestContext;

  async function submit(text: string, ownerId = 'owner-a'): Promise<string> {
    return t.container.submissionService.create({ ownerId, text });
  }

  async function link(parentId: string, childId: string, depthIncrease = 0.2): Promise<string> {
    return t.container.lineageService.link({
      parentId,
      childId,
      refinementType: 'expansion',
      depthIncrease,
    });
  }

  beforeEach(() => {
    t = createTestContext();
  });

  describe('link', () => {
    it('should store the edge and supersede the parent', async () => {
      const parent = await submit('parent');
      const child = await submit('child');

      const edgeId = await t.container.lineageService.link({
        parentId: parent,
        childId: child,
        refinementType: 'technical_depth',
        depthIncrease: 0.3,
        question: 'How would you build it?',
      });

      expect(edgeId).toBe('edge-1');
      const edge = await t.container.lineageService.parentOf(child);
      expect(edge).toMatchObject({
        id: 'edge-1',
        parentId: parent,
        childId: child,
        refinementType: 'technical_depth',
        depthIncrease: 0.3,
        question: 'How would you build it?',
      });
      expect((await t.container.submissionService.get(parent)).status).toBe('superseded');
      expect((await t.container.submissionService.get(child)).status).toBe('submitted');
    });

    it('should let one parent have several children', async () => {
      const parent = await submit('parent');
      const a = await submit('a');
      const b = await submit('b');

      await link(parent, a);
      await link(parent, b);

      const children = await t.container.lineageService.descendants(parent);
      expect(children.map((e) => e.childId)).toEqual([a, b]);
    });

    it('should reject linking a submission to itself', async () => {
      const id = await submit('narcissus');
      await expect(link(id, id)).rejects.toThrow(CycleError);
      expect(t.lineageRepo.count).toBe(0);
    });

    it('should reject a link that closes a cycle', async () => {
      const a = await submit('a');
      const b = await submit('b');
      const c = await submit('c');
      await link(a, b);
      await link(b, c);

      await expect(link(c, a)).rejects.toThrow(CycleError);
      expect(t.lineageRepo.count).toBe(2);
    });

    it('should reject a second parent', async () => {
      const a = await submit('a');
      const b = await submit('b');
      const child = await submit('child');
      await link(a, child);

      const error = await link(b, child).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(MultipleParentError);
      expect(error).toMatchObject({ details: { childId: child, existingParentId: a } });
    });

    it('should reject unknown submissions', async () => {
      const a = await submit('a');
      await expect(link(a, 'IDEA-ZZZZZZ')).rejects.toThrow(NotFoundError);
      await expect(link('IDEA-ZZZZZZ', a)).rejects.toThrow(NotFoundError);
    });

    it('should reject a depth increase outside [0, 1]', async () => {
      const a = await submit('a');
      const b = await submit('b');
      await expect(link(a, b, 1.5)).rejects.toThrow(ValidationError);
    });

    it('should log the link', async () => {
      const a = await submit('a');
      const b = await submit('b');
      await link(a, b);

      const [event] = t.logs.find('submissions linked');
      expect(event.fields).toEqual({
        edgeId: 'edge-1',
        parentId: a,
        childId: b,
        refinementType: 'expansion',
      });
    });

    it('should release every chain lock when done', async () => {
      const a = await submit('a');
      const b = await submit('b');
      await link(a, b);
      await expect(link(b, b)).rejects.toThrow(CycleError);

      const c = await submit('c');
      await link(b, c);
      expect(await t.container.lineageService.rootOf(c)).toBe(a);
    });

    it('should keep a validated parent validated when it is refined', async () => {
      const parent = await submit('parent');
      const child = await submit('child');
      await t.container.outcomeService.recordOutcome(parent, { result: 1, source: 'review' });

      await link(parent, child);

      expect((await t.container.submissionService.get(parent)).status).toBe('validated');
    });

    it('should write nothing when the graft pushes a validated descendant past the ancestor limit', async () => {
      t = createTestContext({ ancestorLimit: 2 });
      const a = await submit('a');
      const b = await submit('b');
      const c = await submit('c');
      const d = await submit('d');
      await link(a, b);
      await link(c, d);
      await t.container.outcomeService.recordOutcome(d, { result: 1, source: 'review' });
      const ledgerBefore = t.ledgerRepo.all();

      await expect(link(b, c)).rejects.toThrow(TruncatedError);

      expect(t.lineageRepo.count).toBe(2);
      expect(await t.container.lineageService.parentOf(c)).toBeNull();
      expect((await t.container.submissionService.get(b)).status).toBe('submitted');
      expect(t.ledgerRepo.all()).toEqual(ledgerBefore);
      expect(t.commitRepo.commits).toBe(3);

      const again = await t.container.outcomeService.recordOutcome(d, {
        result: 0.5,
        source: 'follow-up review',
      });
      expect(again.creditedAncestors).toBe(1);
      expect(t.ledgerRepo.bySource(d).map((e) => e.submission_id)).toEqual([c]);
    });

    it('should retry when another process commits to the chain first', async () => {
      const a = await submit('a');
      const b = await submit('b');
      const versions = t.commitRepo.versions.bind(t.commitRepo);
      vi.spyOn(t.commitRepo, 'versions').mockImplementationOnce(async (roots) => {
        const seen = await versions(roots);
        t.commitRepo.bumpVersion(a);
        return seen;
      });

      await link(a, b);

      expect(t.commitRepo.commits).toBe(2);
      expect(t.lineageRepo.count).toBe(1);
      const [retry] = t.logs.find('lineage chain moved; retrying');
      expect(retry.fields).toEqual({ trackingIds: [a, b], attempt: 1 });
    });
  });

  describe('ancestors', () => {
    it('should be empty for a root', async () => {
      const root = await submit('root');
      expect(await collect(t.container.lineageService.ancestors(root))).toEqual([]);
    });

    it('should walk nearest parent first with distances', async () => {
      const a = await submit('a');
      const b = await submit('b');
      const c = await submit('c');
      await link(a, b);
      await link(b, c);

      const steps = await collect(t.container.lineageService.ancestors(c));
      expect(steps.map((s) => [s.distance, s.ancestorId])).toEqual([
        [1, b],
        [2, a],
      ]);
      expect(steps[0].edge.childId).toBe(c);
    });

    it('should be restartable and see later links', async () => {
      const a = await submit('a');
      const b = await submit('b');
      await link(a, b);

      const walk = t.container.lineageService.ancestors(b);
      expect((await collect(walk)).map((s) => s.ancestorId)).toEqual([a]);
      expect((await collect(walk)).map((s) => s.ancestorId)).toEqual([a]);

      const root = await submit('new root');
      await link(root, a);
      expect((await collect(walk)).map((s) => s.ancestorId)).toEqual([a, root]);
    });

    it('should fail with TruncatedError past the ancestor limit', async () => {
      t = createTestContext({ ancestorLimit: 2 });
      const a = await submit('a');
      const b = await submit('b');
      const c = await submit('c');
      const d = await submit('d');
      await link(a, b);
      await link(b, c);
      await link(c, d);

      await expect(collect(t.container.lineageService.ancestors(d))).rejects.toThrow(
        TruncatedError
      );
      expect(await collect(t.container.lineageService.ancestors(c))).toHaveLength(2);
    });

    it('should terminate on a corrupt stored cycle', async () => {
      t = createTestContext({ ancestorLimit: 5 });
      const createdAt = '2024-01-01T00:00:00.000Z';
      const base = { refinement_type: 'expansion', depth_increase: 0, question: null, created_at: createdAt };
      t.lineageRepo.seed({ id: 'edge-x', parent_id: 'IDEA-X', child_id: 'IDEA-Y', ...base });
      t.lineageRepo.seed({ id: 'edge-y', parent_id: 'IDEA-Y', child_id: 'IDEA-X', ...base });

      await expect(collect(t.container.lineageService.ancestors('IDEA-X'))).rejects.toThrow(
        'Ancestor walk from "IDEA-X" exceeded the limit of 5 steps'
      );
    });
  });

  describe('getAncestors', () => {
    it('should throw NotFoundError for an unknown id', async () => {
      await expect(t.container.lineageService.getAncestors('IDEA-ZZZZZZ')).rejects.toThrow(
        NotFoundError
      );
    });
  });

  describe('tree', () => {
    it('should return the submission with its parent edge and children', async () => {
      const a = await submit('a');
      const b = await submit('b');
      const c = await submit('c');
      await link(a, b);
      await link(b, c);

      const tree = await t.container.lineageService.tree(b);
      expect(tree.submission.id).toBe(b);
      expect(tree.parent?.parentId).toBe(a);
      expect(tree.children.map((e) => e.childId)).toEqual([c]);
    });
  });
});
