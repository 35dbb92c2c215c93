import { describe, it, expect } from 'vitest';
import {
  calculateAccuracy,
  calibrationPenalty,
  daysBetween,
  earlyBirdMultiplier,
} from '../../src/scoring/accuracy.js';
import { ValidationError } from '../../src/errors.js';

describe('accuracy scoring', () => {
  describe('earlyBirdMultiplier', () => {
    it('should be 1 for a same-day validation', () => {
      expect(earlyBirdMultiplier(0)).toBe(1);
    });

    it('should grow by one per year elapsed', () => {
      expect(earlyBirdMultiplier(365)).toBe(2);
      expect(earlyBirdMultiplier(730)).toBe(3);
    });

    it('should cap at 5', () => {
      expect(earlyBirdMultiplier(1460)).toBe(5);
      expect(earlyBirdMultiplier(3650)).toBe(5);
    });
  });

  describe('calibrationPenalty', () => {
    it('should be zero when no confidence was declared', () => {
      expect(calibrationPenalty(null, 0)).toBe(0);
      expect(calibrationPenalty(null, 1)).toBe(0);
    });

    it('should be half the distance between confidence and result', () => {
      expect(calibrationPenalty(1, 0)).toBe(0.5);
      expect(calibrationPenalty(0.5, 0.5)).toBe(0);
      expect(calibrationPenalty(0.25, 0.75)).toBe(0.25);
    });
  });

  describe('calculateAccuracy', () => {
    it('should score a confident correct call validated after 196 days', () => {
      const score = calculateAccuracy({ result: 1, confidence: 0.8, daysElapsed: 196 });

      expect(score.daysElapsed).toBe(196);
      expect(score.earlyBirdMultiplier).toBeCloseTo(1.537, 3);
      expect(score.calibrationPenalty).toBeCloseTo(0.1, 10);
      expect(score.accuracyScore).toBeCloseTo(1.437, 3);
      expect(score.warnings).toEqual([]);
    });

    it('should cap the multiplier for very old ideas', () => {
      const score = calculateAccuracy({ result: 1, confidence: null, daysElapsed: 3650 });
      expect(score.earlyBirdMultiplier).toBe(5);
      expect(score.accuracyScore).toBe(5);
    });

    it('should not penalize an undeclared confidence', () => {
      const score = calculateAccuracy({ result: 0.4, confidence: null, daysElapsed: 0 });
      expect(score.calibrationPenalty).toBe(0);
      expect(score.accuracyScore).toBe(0.4);
    });

    it('should reach the lower bound for a fully confident wrong call', () => {
      const score = calculateAccuracy({ result: 0, confidence: 1, daysElapsed: 1000 });
      expect(score.accuracyScore).toBe(-0.5);
    });

    it('should reach the upper bound for a calibrated correct call after four years', () => {
      const score = calculateAccuracy({ result: 1, confidence: 1, daysElapsed: 1460 });
      expect(score.accuracyScore).toBe(5);
    });

    it('should clamp negative elapsed time to zero with a warning', () => {
      const score = calculateAccuracy({ result: 1, confidence: null, daysElapsed: -3 });

      expect(score.daysElapsed).toBe(0);
      expect(score.earlyBirdMultiplier).toBe(1);
      expect(score.accuracyScore).toBe(1);
      expect(score.warnings).toHaveLength(1);
      expect(score.warnings[0].code).toBe('NEGATIVE_ELAPSED_TIME');
      expect(score.warnings[0].details).toEqual({ daysElapsed: -3 });
    });

    it('should reject a result outside [0, 1]', () => {
      expect(() => calculateAccuracy({ result: 1.2, confidence: null, daysElapsed: 0 })).toThrow(
        ValidationError
      );
      expect(() => calculateAccuracy({ result: -0.1, confidence: null, daysElapsed: 0 })).toThrow(
        'result must be between 0 and 1'
      );
    });

    it('should reject a confidence outside [0, 1]', () => {
      expect(() => calculateAccuracy({ result: 1, confidence: 2, daysElapsed: 0 })).toThrow(
        'confidence must be between 0 and 1'
      );
    });

    it('should reject a non-finite elapsed time', () => {
      expect(() =>
        calculateAccuracy({ result: 1, confidence: null, daysElapsed: Number.NaN })
      ).toThrow(ValidationError);
    });
  });

  describe('daysBetween', () => {
    it('should return fractional days', () => {
      const from = new Date('2024-01-01T00:00:00.000Z');
      const to = new Date('2024-01-03T12:00:00.000Z');
      expect(daysBetween(from, to)).toBe(2.5);
    });

    it('should be negative when the end precedes the start', () => {
      const from = new Date('2024-01-02T00:00:00.000Z');
      const to = new Date('2024-01-01T00:00:00.000Z');
      expect(daysBetween(from, to)).toBe(-1);
    });
  });

  describe('across the input space', () => {
    const results = Array.from({ length: 11 }, (_, i) => i / 10);
    const confidences = [null, ...results];
    const days = [-30, 0, 0.5, 1, 30, 100, 182.5, 365, 730, 1000, 1459, 1460, 1461, 2000, 5000];

    it('should keep every score within [-0.5, 5]', () => {
      for (const result of results) {
        for (const confidence of confidences) {
          for (const daysElapsed of days) {
            const { accuracyScore } = calculateAccuracy({ result, confidence, daysElapsed });
            expect(accuracyScore).toBeGreaterThanOrEqual(-0.5);
            expect(accuracyScore).toBeLessThanOrEqual(5);
          }
        }
      }
    });

    it('should never lower the multiplier as more days pass', () => {
      const multipliers = days.map((d) => earlyBirdMultiplier(d));
      for (let i = 1; i < multipliers.length; i++) {
        expect(multipliers[i]).toBeGreaterThanOrEqual(multipliers[i - 1]);
      }
      expect(multipliers[0]).toBe(1);
      expect(multipliers[multipliers.length - 1]).toBe(5);
    });

    it('should never lower the score as more days pass', () => {
      for (const result of results) {
        for (const confidence of confidences) {
          const scores = days.map(
            (daysElapsed) => calculateAccuracy({ result, confidence, daysElapsed }).accuracyScore
          );
          for (let i = 1; i < scores.length; i++) {
            expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
          }
        }
      }
    });
  });
});
