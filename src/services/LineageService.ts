/**
 * Lineage graph.
 * A single-parent tree of refinements over submissions. Linking a child
 * supersedes its parent and grafts the child's whole subtree under the
 * parent's chain, so validated descendants re-propagate their credit.
 *
 * Writers queue on the in-process ChainLock, then commit with a guard of
 * each chain's root and version. Another process that committed to the same
 * chain in the meantime makes the guard stale; the write is then re-planned.
 */

import type { ILineageRepository } from '../repositories/ILineageRepository.js';
import type { ChainGuard, IChainCommitRepository } from '../repositories/IChainCommitRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { LinkIdeasRequest, LineageTreeResponse } from '../types/api.js';
import { REFINEMENT_TYPES, type AncestorStep, type LineageEdge } from '../types/models.js';
import { systemClock, type Clock } from '../types/common.js';
import { toLineageEdge } from '../types/mappers.js';
import type { SubmissionService } from './SubmissionService.js';
import type { BackpropagationService } from './BackpropagationService.js';
import type { ReputationService } from './ReputationService.js';
import type { ChainLock } from './ChainLock.js';
import { DEFAULT_ANCESTOR_LIMIT, walkAncestors } from './lineage-walk.js';
import { assertUnitInterval } from '../scoring/accuracy.js';
import { ChainMovedError, CycleError, MultipleParentError, ValidationError } from '../errors.js';

const MAX_QUESTION_LENGTH = 1000;
const MAX_LOCK_ATTEMPTS = 5;

export interface LineageOptions {
  ancestorLimit?: number;
}

export class LineageService {
  private readonly ancestorLimit: number;

  constructor(
    private readonly lineageRepo: ILineageRepository,
    private readonly commitRepo: IChainCommitRepository,
    private readonly submissions: SubmissionService,
    private readonly backpropagation: BackpropagationService,
    private readonly reputation: ReputationService,
    private readonly chainLock: ChainLock,
    private readonly logProvider: ILogProvider,
    options: LineageOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.ancestorLimit = options.ancestorLimit ?? DEFAULT_ANCESTOR_LIMIT;
  }

  /** Record `childId` as a refinement of `parentId`. Returns the edge id. */
  async link(input: LinkIdeasRequest): Promise<string> {
    this.validate(input);

    const { edge, affectedOwners } = await this.withChainLock(
      [input.parentId, input.childId],
      async (chain) => {
        const [parent, child] = await Promise.all([
          this.submissions.get(input.parentId),
          this.submissions.get(input.childId),
        ]);

        if (parent.id === child.id || (await this.isAncestor(child.id, parent.id))) {
          throw new CycleError(parent.id, child.id);
        }

        const existing = await this.lineageRepo.findParentEdge(child.id);
        if (existing) {
          throw new MultipleParentError(child.id, existing.parent_id);
        }

        const edge = {
          parent_id: parent.id,
          child_id: child.id,
          refinement_type: input.refinementType,
          depth_increase: input.depthIncrease,
          question: input.question ?? null,
          created_at: this.clock().toISOString(),
        };
        const plans = await this.backpropagation.planGraft(edge);

        const committed = await this.commitRepo.commitLink({ chain, edge, credit: plans });
        const settled = await Promise.all(
          committed.ledger.map((replacement) => this.backpropagation.settle(replacement))
        );
        const owners = new Set([child.ownerId, ...settled.flatMap((r) => r.affectedOwners)]);
        return { edge: toLineageEdge(committed.edge), affectedOwners: owners };
      }
    );

    this.logProvider.info('submissions linked', {
      edgeId: edge.id,
      parentId: edge.parentId,
      childId: edge.childId,
      refinementType: edge.refinementType,
    });

    await this.reputation.recomputeMany(affectedOwners);
    return edge.id;
  }

  /**
   * Lazy walk from `trackingId` up to its root, nearest parent first.
   * Restartable; each iteration re-reads the store.
   */
  ancestors(trackingId: string): AsyncIterable<AncestorStep> {
    return walkAncestors(this.lineageRepo, trackingId, this.ancestorLimit);
  }

  /** Like `ancestors`, but fails NotFound for an unknown id. */
  async getAncestors(trackingId: string): Promise<AsyncIterable<AncestorStep>> {
    await this.submissions.get(trackingId);
    return this.ancestors(trackingId);
  }

  /** Direct children only. */
  async descendants(trackingId: string): Promise<LineageEdge[]> {
    const rows = await this.lineageRepo.findChildren(trackingId);
    return rows.map(toLineageEdge);
  }

  async parentOf(trackingId: string): Promise<LineageEdge | null> {
    const row = await this.lineageRepo.findParentEdge(trackingId);
    return row ? toLineageEdge(row) : null;
  }

  async tree(trackingId: string): Promise<LineageTreeResponse> {
    const submission = await this.submissions.get(trackingId);
    const [parent, children] = await Promise.all([
      this.parentOf(trackingId),
      this.descendants(trackingId),
    ]);
    return { submission, parent, children };
  }

  async rootOf(trackingId: string): Promise<string> {
    let root = trackingId;
    for await (const step of this.ancestors(trackingId)) {
      root = step.ancestorId;
    }
    return root;
  }

  /**
   * Run `task` while holding the chains that contain `trackingIds`, handing
   * it the guard its commit must carry. Chains are keyed by root; if a root
   * moved while we waited, or the commit finds the guard stale, the lock is
   * released and taken again on the current roots.
   */
  async withChainLock<T>(
    trackingIds: string[],
    task: (chain: ChainGuard[]) => Promise<T>
  ): Promise<T> {
    for (let attempt = 1; attempt <= MAX_LOCK_ATTEMPTS; attempt++) {
      const roots = await this.rootsOf(trackingIds);
      const outcome = await this.chainLock.run(roots, async () => {
        const chain = await this.guard(trackingIds);
        if (chain.some((g, i) => g.root !== roots[i])) {
          return { moved: true } as const;
        }
        try {
          return { moved: false, value: await task(chain) } as const;
        } catch (err) {
          if (err instanceof ChainMovedError) return { moved: true } as const;
          throw err;
        }
      });
      if (!outcome.moved) return outcome.value;
      this.logProvider.debug('lineage chain moved; retrying', { trackingIds, attempt });
    }
    throw new ChainMovedError(trackingIds.join(', '));
  }

  private async rootsOf(trackingIds: string[]): Promise<string[]> {
    return Promise.all(trackingIds.map((id) => this.rootOf(id)));
  }

  private async guard(trackingIds: string[]): Promise<ChainGuard[]> {
    const roots = await this.rootsOf(trackingIds);
    const versions = await this.commitRepo.versions([...new Set(roots)]);
    return trackingIds.map((trackingId, i) => {
      const root = roots[i];
      return { trackingId, root, version: versions.get(root) ?? 0 };
    });
  }

  private async isAncestor(candidateId: string, ofId: string): Promise<boolean> {
    for await (const step of this.ancestors(ofId)) {
      if (step.ancestorId === candidateId) return true;
    }
    return false;
  }

  private validate(input: LinkIdeasRequest): void {
    if (!REFINEMENT_TYPES.includes(input.refinementType)) {
      throw new ValidationError(
        `Invalid refinementType: "${input.refinementType}". Must be one of: ${REFINEMENT_TYPES.join(', ')}`
      );
    }
    assertUnitInterval('depthIncrease', input.depthIncrease);
    if (input.question !== undefined && input.question.length > MAX_QUESTION_LENGTH) {
      throw new ValidationError(`question must be ${MAX_QUESTION_LENGTH} characters or less`);
    }
  }
}
