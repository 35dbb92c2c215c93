/**
 * Outcome validator.
 * Scores a validation against the submission's declared confidence and
 * age, then commits the outcome, its credit up the lineage and the
 * validated status together, and refreshes every profile the write touched.
 */

import type { IOutcomeRepository } from '../repositories/IOutcomeRepository.js';
import type { IChainCommitRepository } from '../repositories/IChainCommitRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { INotificationProvider } from '../providers/INotificationProvider.js';
import type { RecordOutcomeRequest } from '../types/api.js';
import type { Outcome } from '../types/models.js';
import { systemClock, type Clock } from '../types/common.js';
import { toOutcome } from '../types/mappers.js';
import { assertUnitInterval, calculateAccuracy, daysBetween } from '../scoring/accuracy.js';
import type { SubmissionService } from './SubmissionService.js';
import type { LineageService } from './LineageService.js';
import type { BackpropagationService } from './BackpropagationService.js';
import type { ReputationService } from './ReputationService.js';
import { NotFoundError, ValidationError, type DataIntegrityWarning } from '../errors.js';

const MAX_SOURCE_LENGTH = 500;
const MAX_URL_LENGTH = 2000;
const MAX_NOTES_LENGTH = 5000;

export interface RecordOutcomeResult {
  outcome: Outcome;
  creditedAncestors: number;
  warnings: DataIntegrityWarning[];
}

export class OutcomeService {
  constructor(
    private readonly outcomeRepo: IOutcomeRepository,
    private readonly commitRepo: IChainCommitRepository,
    private readonly submissions: SubmissionService,
    private readonly lineage: LineageService,
    private readonly backpropagation: BackpropagationService,
    private readonly reputation: ReputationService,
    private readonly notifications: INotificationProvider,
    private readonly logProvider: ILogProvider,
    private readonly clock: Clock = systemClock
  ) {}

  async recordOutcome(
    trackingId: string,
    input: RecordOutcomeRequest
  ): Promise<RecordOutcomeResult> {
    this.validate(input);

    const written = await this.lineage.withChainLock([trackingId], async (chain) => {
      const submission = await this.submissions.get(trackingId);
      const validatedAt = input.validatedAt ?? this.clock();

      const score = calculateAccuracy({
        result: input.result,
        confidence: submission.confidence,
        daysElapsed: daysBetween(submission.createdAt, validatedAt),
      });
      const plan = await this.backpropagation.plan(submission.id, score.accuracyScore);

      const committed = await this.commitRepo.commitOutcome({
        chain,
        outcome: {
          submission_id: submission.id,
          result: input.result,
          validation_source: input.source,
          validation_url: input.url ?? null,
          validation_notes: input.notes ?? null,
          validated_at: validatedAt.toISOString(),
          days_elapsed: score.daysElapsed,
          early_bird_multiplier: score.earlyBirdMultiplier,
          calibration_penalty: score.calibrationPenalty,
          accuracy_score: score.accuracyScore,
        },
        credit: plan,
      });
      const propagation = await this.backpropagation.settle(committed.ledger);

      return {
        submission,
        outcome: toOutcome(committed.outcome),
        propagation,
        warnings: score.warnings,
      };
    });

    const { submission, outcome, propagation, warnings } = written;

    for (const warning of warnings) {
      this.logProvider.warn(warning.message, {
        code: warning.code,
        trackingId,
        ...warning.details,
      });
    }
    this.logProvider.info('outcome recorded', {
      trackingId,
      outcomeId: outcome.id,
      result: outcome.result,
      accuracyScore: outcome.accuracyScore,
      daysElapsed: outcome.daysElapsed,
    });

    await this.reputation.recomputeMany([submission.ownerId, ...propagation.affectedOwners]);

    this.notifications.notify({
      type: 'outcome.recorded',
      trackingId,
      ownerId: submission.ownerId,
      outcomeId: outcome.id,
      result: outcome.result,
      accuracyScore: outcome.accuracyScore,
    });

    return {
      outcome,
      creditedAncestors: propagation.entries.length,
      warnings,
    };
  }

  async getOutcome(trackingId: string): Promise<Outcome> {
    const row = await this.outcomeRepo.findBySubmission(trackingId);
    if (!row) {
      throw new NotFoundError(`Submission "${trackingId}" has no outcome`);
    }
    return toOutcome(row);
  }

  private validate(input: RecordOutcomeRequest): void {
    assertUnitInterval('result', input.result);
    if (!input.source || input.source.trim().length === 0) {
      throw new ValidationError('source is required');
    }
    if (input.source.length > MAX_SOURCE_LENGTH) {
      throw new ValidationError(`source must be ${MAX_SOURCE_LENGTH} characters or less`);
    }
    if (input.url !== undefined && input.url.length > MAX_URL_LENGTH) {
      throw new ValidationError(`url must be ${MAX_URL_LENGTH} characters or less`);
    }
    if (input.notes !== undefined && input.notes.length > MAX_NOTES_LENGTH) {
      throw new ValidationError(`notes must be ${MAX_NOTES_LENGTH} characters or less`);
    }
    if (input.validatedAt !== undefined && Number.isNaN(input.validatedAt.getTime())) {
      throw new ValidationError('validatedAt must be a valid date');
    }
  }
}
