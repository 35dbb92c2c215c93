/**
 * Row ↔ model conversion.
 * Rows are what repositories speak; services work with models.
 */

import type {
  CreditLedgerRow,
  LineageEdgeRow,
  OutcomeRow,
  ProfileRow,
  SubmissionRow,
} from './database.js';
import {
  isRefinementType,
  isSubmissionStatus,
  type CreditLedgerEntry,
  type IdeaSubmission,
  type LineageEdge,
  type Outcome,
  type UserAccuracyProfile,
} from './models.js';

export function toSubmission(row: SubmissionRow): IdeaSubmission {
  if (!isSubmissionStatus(row.status)) {
    throw new Error(`Submission "${row.id}" has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    ownerId: row.owner_id,
    text: row.text,
    confidence: row.confidence,
    classification: row.classification,
    status: row.status,
    createdAt: new Date(row.created_at),
  };
}

export function toLineageEdge(row: LineageEdgeRow): LineageEdge {
  if (!isRefinementType(row.refinement_type)) {
    throw new Error(
      `Lineage edge "${row.id}" has unknown refinement type "${row.refinement_type}"`
    );
  }
  return {
    id: row.id,
    parentId: row.parent_id,
    childId: row.child_id,
    refinementType: row.refinement_type,
    depthIncrease: row.depth_increase,
    question: row.question,
    createdAt: new Date(row.created_at),
  };
}

export function toOutcome(row: OutcomeRow): Outcome {
  return {
    id: row.id,
    submissionId: row.submission_id,
    result: row.result,
    validationSource: row.validation_source,
    validationUrl: row.validation_url,
    validationNotes: row.validation_notes,
    validatedAt: new Date(row.validated_at),
    daysElapsed: row.days_elapsed,
    earlyBirdMultiplier: row.early_bird_multiplier,
    calibrationPenalty: row.calibration_penalty,
    accuracyScore: row.accuracy_score,
  };
}

export function toCreditLedgerEntry(row: CreditLedgerRow): CreditLedgerEntry {
  return {
    submissionId: row.submission_id,
    sourceDescendantId: row.source_descendant_id,
    distance: row.distance,
    creditedAmount: row.credited_amount,
    appliedAt: new Date(row.applied_at),
  };
}

export function toProfile(row: ProfileRow): UserAccuracyProfile {
  return {
    ownerId: row.owner_id,
    totalSubmissions: row.total_submissions,
    totalValidations: row.total_validations,
    accuracyRate: row.accuracy_rate,
    calibrationScore: row.calibration_score,
    reputationScore: row.reputation_score,
    meanDaysEarly: row.mean_days_early,
    directScore: row.direct_score,
    inheritedCredit: row.inherited_credit,
    depthLevel: row.depth_level,
    lastValidationAt: row.last_validation_at ? new Date(row.last_validation_at) : null,
    updatedAt: new Date(row.updated_at),
  };
}

export function toProfileRow(profile: UserAccuracyProfile): ProfileRow {
  return {
    owner_id: profile.ownerId,
    total_submissions: profile.totalSubmissions,
    total_validations: profile.totalValidations,
    accuracy_rate: profile.accuracyRate,
    calibration_score: profile.calibrationScore,
    reputation_score: profile.reputationScore,
    mean_days_early: profile.meanDaysEarly,
    direct_score: profile.directScore,
    inherited_credit: profile.inheritedCredit,
    depth_level: profile.depthLevel,
    last_validation_at: profile.lastValidationAt?.toISOString() ?? null,
    updated_at: profile.updatedAt.toISOString(),
  };
}
