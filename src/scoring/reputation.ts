/**
 * Reputation aggregation.
 * Derives a UserAccuracyProfile from nothing but the owner's submissions,
 * their outcomes, their incoming lineage edges and the ledger credit they
 * earned. The same inputs always give the same profile.
 */

import type {
  CreditLedgerEntry,
  IdeaSubmission,
  LineageEdge,
  Outcome,
  UserAccuracyProfile,
} from '../types/models.js';
import { DAYS_PER_YEAR } from './accuracy.js';

export const REPUTATION_WEIGHTS = {
  accuracy: 0.4,
  calibration: 0.3,
  earliness: 0.3,
} as const;

/** A result at or above this counts as a correct call. */
export const CORRECT_RESULT_THRESHOLD = 0.5;

export interface ProfileInputs {
  ownerId: string;
  submissions: IdeaSubmission[];
  outcomes: Outcome[];
  credits: CreditLedgerEntry[];
  edges: LineageEdge[];
}

export function computeProfile(inputs: ProfileInputs, updatedAt: Date): UserAccuracyProfile {
  const owned = new Map(
    inputs.submissions
      .filter((s) => s.ownerId === inputs.ownerId)
      .map((s) => [s.id, s] as const)
  );

  // Fixed summation order keeps floating-point totals reproducible.
  const outcomes = inputs.outcomes
    .filter((o) => owned.has(o.submissionId))
    .sort((a, b) => compareIds(a.submissionId, b.submissionId));
  const credits = inputs.credits
    .filter((c) => owned.has(c.submissionId))
    .sort(
      (a, b) =>
        compareIds(a.submissionId, b.submissionId) ||
        compareIds(a.sourceDescendantId, b.sourceDescendantId)
    );
  const edges = inputs.edges
    .filter((e) => owned.has(e.childId))
    .sort((a, b) => compareIds(a.childId, b.childId));

  const totalSubmissions = owned.size;
  const totalValidations = outcomes.length;

  const calibrationErrors: number[] = [];
  for (const outcome of outcomes) {
    const confidence = owned.get(outcome.submissionId)?.confidence ?? null;
    if (confidence !== null) {
      calibrationErrors.push(Math.abs(confidence - outcome.result));
    }
  }

  const accuracyRate =
    totalValidations === 0
      ? 0
      : outcomes.filter((o) => o.result >= CORRECT_RESULT_THRESHOLD).length / totalValidations;

  let calibrationScore = 0;
  if (totalValidations > 0) {
    calibrationScore = calibrationErrors.length === 0 ? 1 : 1 - mean(calibrationErrors);
  }

  const meanDaysEarly = totalValidations === 0 ? 0 : mean(outcomes.map((o) => o.daysElapsed));
  const daysEarlyNormalized = clamp(meanDaysEarly / DAYS_PER_YEAR, 0, 1);

  const reputationScore =
    REPUTATION_WEIGHTS.accuracy * accuracyRate +
    REPUTATION_WEIGHTS.calibration * calibrationScore +
    REPUTATION_WEIGHTS.earliness * daysEarlyNormalized;

  const depthSum = sum(edges.map((e) => e.depthIncrease));

  let lastValidationAt: Date | null = null;
  for (const outcome of outcomes) {
    if (!lastValidationAt || outcome.validatedAt > lastValidationAt) {
      lastValidationAt = outcome.validatedAt;
    }
  }

  return {
    ownerId: inputs.ownerId,
    totalSubmissions,
    totalValidations,
    accuracyRate,
    calibrationScore,
    reputationScore,
    meanDaysEarly,
    directScore: sum(outcomes.map((o) => o.accuracyScore)),
    inheritedCredit: sum(credits.map((c) => c.creditedAmount)),
    depthLevel: Math.min(1, depthSum / Math.max(1, totalSubmissions)),
    lastValidationAt,
    updatedAt,
  };
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function mean(values: number[]): number {
  return sum(values) / values.length;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
