/**
 * Outcome endpoints.
 * POST /api/v1/submissions/:id/outcome Record (or replace) a validation outcome
 * GET  /api/v1/submissions/:id/outcome Get the live outcome
 */

import { pipeline, validateBody, bodyOf } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { RecordOutcomeResponse } from '../types/api.js';
import { json, optionalString, parseDate, pathSegment, requiredNumber, requiredString } from './http.js';

const outcomeSchema: BodySchema = {
  result: { type: 'number', required: true, min: 0, max: 1 },
  source: { type: 'string', required: true, maxLength: 500 },
  validatedAt: { type: 'string', required: false, maxLength: 64 },
  url: { type: 'string', required: false, maxLength: 2000 },
  notes: { type: 'string', required: false, maxLength: 5000 },
};

export function createOutcomeHandlers(container: Container) {
  const record: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(outcomeSchema)
  )(async (req, ctx) => {
    const trackingId = pathSegment(req, 3);
    const body = bodyOf(ctx);
    const validatedAt = optionalString(body, 'validatedAt');

    const { outcome, creditedAncestors, warnings } =
      await container.outcomeService.recordOutcome(trackingId, {
        result: requiredNumber(body, 'result'),
        source: requiredString(body, 'source'),
        validatedAt: validatedAt === undefined ? undefined : parseDate(validatedAt, 'validatedAt'),
        url: optionalString(body, 'url'),
        notes: optionalString(body, 'notes'),
      });

    const response: RecordOutcomeResponse = {
      outcomeId: outcome.id,
      accuracyScore: outcome.accuracyScore,
      earlyBirdMultiplier: outcome.earlyBirdMultiplier,
      calibrationPenalty: outcome.calibrationPenalty,
      daysElapsed: outcome.daysElapsed,
      creditedAncestors,
      warnings: warnings.map((w) => w.toJSON()),
    };
    return json(response);
  });

  const get: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const trackingId = pathSegment(req, 3);
    return json(await container.outcomeService.getOutcome(trackingId));
  });

  return { record, get };
}
