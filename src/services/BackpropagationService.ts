/**
 * Backpropagation engine.
 * When a submission is validated, every ancestor in its lineage earns a
 * share of the outcome's accuracy score that halves (by default) with each
 * step up the tree:
 *
 *   creditedAmount = accuracyScore * depthDecayFactor ^ distance
 *
 * Credit lands in the ledger keyed by the validated descendant. Plans are
 * computed read-only and committed by the caller in one chain commit, which
 * replaces that descendant's previous entries, so re-running never
 * double-counts and never touches an ancestor's own outcome.
 */

import type { CreditLedgerInput } from '../repositories/ICreditLedgerRepository.js';
import type { ILineageRepository, InsertLineageEdgeInput } from '../repositories/ILineageRepository.js';
import type { IOutcomeRepository } from '../repositories/IOutcomeRepository.js';
import type { ISubmissionRepository } from '../repositories/ISubmissionRepository.js';
import type { LedgerReplacement } from '../repositories/IChainCommitRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { CreditLedgerEntry } from '../types/models.js';
import type { LineageEdgeRow } from '../types/database.js';
import { systemClock, type Clock } from '../types/common.js';
import { toCreditLedgerEntry } from '../types/mappers.js';
import { DEFAULT_ANCESTOR_LIMIT, walkAncestors, type ParentLookup } from './lineage-walk.js';

export const DEFAULT_DEPTH_DECAY_FACTOR = 0.5;

const PENDING_EDGE_ID = 'pending';

export interface BackpropagationOptions {
  depthDecayFactor?: number;
  ancestorLimit?: number;
}

/** Credit computed for one descendant, not yet written. */
export interface CreditPlan {
  sourceDescendantId: string;
  accuracyScore: number;
  entries: CreditLedgerInput[];
}

export interface PropagationResult {
  sourceDescendantId: string;
  entries: CreditLedgerEntry[];
  /** Owners whose inherited credit may have changed (old or new recipients). */
  affectedOwners: string[];
}

export class BackpropagationService {
  private readonly depthDecayFactor: number;
  private readonly ancestorLimit: number;

  constructor(
    private readonly lineageRepo: ILineageRepository,
    private readonly outcomeRepo: IOutcomeRepository,
    private readonly submissionRepo: ISubmissionRepository,
    private readonly logProvider: ILogProvider,
    options: BackpropagationOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.depthDecayFactor = options.depthDecayFactor ?? DEFAULT_DEPTH_DECAY_FACTOR;
    this.ancestorLimit = options.ancestorLimit ?? DEFAULT_ANCESTOR_LIMIT;
  }

  /**
   * Walk the ancestors of `submissionId` and compute their credit.
   * Reads only; throws TruncatedError before anything is written.
   */
  async plan(submissionId: string, accuracyScore: number): Promise<CreditPlan> {
    return this.planAlong(this.lineageRepo, submissionId, accuracyScore);
  }

  /**
   * Plan every validated submission in the subtree under `edge.child_id`
   * as if `edge` were already stored. Throws TruncatedError when the graft
   * would push any of them past the ancestor limit.
   */
  async planGraft(edge: InsertLineageEdgeInput): Promise<CreditPlan[]> {
    const pending: LineageEdgeRow = { ...edge, id: PENDING_EDGE_ID };
    const grafted: ParentLookup = {
      findParentEdge: async (childId) =>
        childId === edge.child_id ? pending : this.lineageRepo.findParentEdge(childId),
    };

    const plans: CreditPlan[] = [];
    const visited = new Set<string>();
    const queue = [edge.child_id];

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || visited.has(id)) continue;
      visited.add(id);

      const outcome = await this.outcomeRepo.findBySubmission(id);
      if (outcome) {
        plans.push(await this.planAlong(grafted, id, outcome.accuracy_score));
      }

      const children = await this.lineageRepo.findChildren(id);
      queue.push(...children.map((c) => c.child_id));
    }

    return plans;
  }

  /** Resolve who a committed replacement touched and log it. */
  async settle(replacement: LedgerReplacement): Promise<PropagationResult> {
    const recipientIds = new Set([
      ...replacement.retracted.map((r) => r.submission_id),
      ...replacement.entries.map((e) => e.submission_id),
    ]);
    const recipients = await this.submissionRepo.findByIds([...recipientIds]);
    const affectedOwners = [...new Set(recipients.map((r) => r.owner_id))].sort();

    this.logProvider.info('credit propagated', {
      sourceDescendantId: replacement.sourceDescendantId,
      ancestors: replacement.entries.length,
      retracted: replacement.retracted.length,
    });

    return {
      sourceDescendantId: replacement.sourceDescendantId,
      entries: replacement.entries
        .map(toCreditLedgerEntry)
        .sort((a, b) => a.distance - b.distance),
      affectedOwners,
    };
  }

  private async planAlong(
    lineage: ParentLookup,
    submissionId: string,
    accuracyScore: number
  ): Promise<CreditPlan> {
    const appliedAt = this.clock().toISOString();
    const entries: CreditLedgerInput[] = [];

    for await (const step of walkAncestors(lineage, submissionId, this.ancestorLimit)) {
      entries.push({
        submission_id: step.ancestorId,
        source_descendant_id: submissionId,
        distance: step.distance,
        credited_amount: accuracyScore * Math.pow(this.depthDecayFactor, step.distance),
        applied_at: appliedAt,
      });
    }

    return { sourceDescendantId: submissionId, accuracyScore, entries };
  }
}
