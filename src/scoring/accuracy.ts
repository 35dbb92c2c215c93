/**
 * Accuracy scoring.
 * Pure functions: a correct call validated long after it was made earns an
 * early-bird multiplier, and declared confidence that strays from the
 * eventual result costs a calibration penalty. Undeclared confidence is
 * never penalized.
 *
 *   accuracyScore = result * min(5, 1 + days / 365) - |confidence - result| * 0.5
 *
 * The score always lies in [-0.5, 5.0].
 */

import { DataIntegrityWarning, ValidationError } from '../errors.js';

export const MAX_EARLY_BIRD_MULTIPLIER = 5.0;
export const DAYS_PER_YEAR = 365.0;
export const CALIBRATION_WEIGHT = 0.5;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface AccuracyInput {
  /** How right the idea was, 0..1. */
  result: number;
  /** Confidence declared at submission, or null when none was given. */
  confidence: number | null;
  daysElapsed: number;
}

export interface AccuracyBreakdown {
  /** Days elapsed after clamping. */
  daysElapsed: number;
  earlyBirdMultiplier: number;
  calibrationPenalty: number;
  accuracyScore: number;
  warnings: DataIntegrityWarning[];
}

export function earlyBirdMultiplier(daysElapsed: number): number {
  return Math.min(MAX_EARLY_BIRD_MULTIPLIER, 1.0 + Math.max(0, daysElapsed) / DAYS_PER_YEAR);
}

export function calibrationPenalty(confidence: number | null, result: number): number {
  if (confidence === null) return 0;
  return Math.abs(confidence - result) * CALIBRATION_WEIGHT;
}

/** Fractional days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_DAY;
}

export function calculateAccuracy(input: AccuracyInput): AccuracyBreakdown {
  assertUnitInterval('result', input.result);
  if (input.confidence !== null) {
    assertUnitInterval('confidence', input.confidence);
  }
  if (!Number.isFinite(input.daysElapsed)) {
    throw new ValidationError('daysElapsed must be a finite number', {
      daysElapsed: input.daysElapsed,
    });
  }

  const warnings: DataIntegrityWarning[] = [];
  let daysElapsed = input.daysElapsed;
  if (daysElapsed < 0) {
    warnings.push(
      new DataIntegrityWarning(
        'NEGATIVE_ELAPSED_TIME',
        'Validation predates submission; elapsed time clamped to 0',
        { daysElapsed }
      )
    );
    daysElapsed = 0;
  }

  const multiplier = earlyBirdMultiplier(daysElapsed);
  const penalty = calibrationPenalty(input.confidence, input.result);

  return {
    daysElapsed,
    earlyBirdMultiplier: multiplier,
    calibrationPenalty: penalty,
    accuracyScore: input.result * multiplier - penalty,
    warnings,
  };
}

export function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(`${name} must be between 0 and 1`, { [name]: value });
  }
}
