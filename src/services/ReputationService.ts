/**
 * Reputation aggregator.
 * Rebuilds an owner's profile from their submissions, outcomes, incoming
 * lineage edges and ledger credit, then caches it. Recomputing is always
 * safe and is the recovery path for any suspected inconsistency.
 */

import type { ICreditLedgerRepository } from '../repositories/ICreditLedgerRepository.js';
import type { ILineageRepository } from '../repositories/ILineageRepository.js';
import type { IOutcomeRepository } from '../repositories/IOutcomeRepository.js';
import type { IProfileRepository } from '../repositories/IProfileRepository.js';
import type { ISubmissionRepository } from '../repositories/ISubmissionRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { INotificationProvider } from '../providers/INotificationProvider.js';
import type { UserAccuracyProfile } from '../types/models.js';
import { systemClock, type Clock } from '../types/common.js';
import {
  toCreditLedgerEntry,
  toLineageEdge,
  toOutcome,
  toProfile,
  toProfileRow,
  toSubmission,
} from '../types/mappers.js';
import { computeProfile } from '../scoring/reputation.js';
import { NotFoundError } from '../errors.js';

export const DEFAULT_MATERIAL_CHANGE_THRESHOLD = 0.01;

export interface ReputationOptions {
  /** Smallest reputation move worth a profile.changed notification. */
  materialChangeThreshold?: number;
}

export class ReputationService {
  private readonly materialChangeThreshold: number;

  constructor(
    private readonly submissionRepo: ISubmissionRepository,
    private readonly outcomeRepo: IOutcomeRepository,
    private readonly ledgerRepo: ICreditLedgerRepository,
    private readonly lineageRepo: ILineageRepository,
    private readonly profileRepo: IProfileRepository,
    private readonly notifications: INotificationProvider,
    private readonly logProvider: ILogProvider,
    options: ReputationOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.materialChangeThreshold =
      options.materialChangeThreshold ?? DEFAULT_MATERIAL_CHANGE_THRESHOLD;
  }

  /** Derive the profile without persisting it. Null when the owner has no submissions. */
  async compute(ownerId: string): Promise<UserAccuracyProfile | null> {
    const submissions = (await this.submissionRepo.findByOwner(ownerId)).map(toSubmission);
    if (submissions.length === 0) return null;

    const ids = submissions.map((s) => s.id);
    const [outcomes, credits, edges] = await Promise.all([
      this.outcomeRepo.findBySubmissions(ids),
      this.ledgerRepo.findBySubmissions(ids),
      this.lineageRepo.findByChildIds(ids),
    ]);

    return computeProfile(
      {
        ownerId,
        submissions,
        outcomes: outcomes.map(toOutcome),
        credits: credits.map(toCreditLedgerEntry),
        edges: edges.map(toLineageEdge),
      },
      this.clock()
    );
  }

  /** Derive, persist and announce material changes. */
  async recompute(ownerId: string): Promise<UserAccuracyProfile> {
    const profile = await this.compute(ownerId);
    if (!profile) {
      throw new NotFoundError(`Owner "${ownerId}" has no submissions`);
    }

    const previousRow = await this.profileRepo.findByOwner(ownerId);
    const previous = previousRow ? toProfile(previousRow) : null;
    await this.profileRepo.upsert(toProfileRow(profile));

    this.logProvider.debug('profile recomputed', {
      ownerId,
      reputationScore: profile.reputationScore,
      totalValidations: profile.totalValidations,
    });

    if (this.isMaterialChange(previous, profile)) {
      this.notifications.notify({
        type: 'profile.changed',
        ownerId,
        previousReputation: previous?.reputationScore ?? null,
        reputationScore: profile.reputationScore,
      });
    }

    return profile;
  }

  async recomputeMany(ownerIds: Iterable<string>): Promise<UserAccuracyProfile[]> {
    const unique = [...new Set(ownerIds)].sort();
    const profiles: UserAccuracyProfile[] = [];
    for (const ownerId of unique) {
      profiles.push(await this.recompute(ownerId));
    }
    return profiles;
  }

  async getProfile(ownerId: string): Promise<UserAccuracyProfile> {
    return this.recompute(ownerId);
  }

  private isMaterialChange(
    previous: UserAccuracyProfile | null,
    next: UserAccuracyProfile
  ): boolean {
    if (!previous) return true;
    return (
      Math.abs(next.reputationScore - previous.reputationScore) >= this.materialChangeThreshold
    );
  }
}
