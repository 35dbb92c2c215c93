/**
 * Submission endpoints.
 * POST /api/v1/submissions                  Submit an idea
 * GET  /api/v1/submissions/:id              Get a submission
 * GET  /api/v1/submissions/:id/ancestors    Walk the lineage up to the root
 * GET  /api/v1/submissions/:id/lineage      Parent edge and direct children
 */

import { pipeline, validateBody, bodyOf } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { AncestorsResponse, SubmitIdeaResponse } from '../types/api.js';
import { collect } from '../services/sequence.js';
import { json, optionalNumber, optionalString, pathSegment, requiredString } from './http.js';

const submitSchema: BodySchema = {
  ownerId: { type: 'string', required: true, maxLength: 200 },
  text: { type: 'string', required: true, maxLength: 5000 },
  confidence: { type: 'number', required: false, min: 0, max: 1 },
  classification: { type: 'string', required: false, maxLength: 200 },
};

export function createSubmissionHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(submitSchema)
  )(async (_req, ctx) => {
    const body = bodyOf(ctx);

    const trackingId = await container.submissionService.create({
      ownerId: requiredString(body, 'ownerId'),
      text: requiredString(body, 'text'),
      confidence: optionalNumber(body, 'confidence') ?? null,
      classification: optionalString(body, 'classification') ?? null,
    });

    const response: SubmitIdeaResponse = { trackingId };
    return json(response, 201);
  });

  const getById: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const trackingId = pathSegment(req, 3);
    return json(await container.submissionService.get(trackingId));
  });

  const getAncestors: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const trackingId = pathSegment(req, 3);
    const ancestors = await collect(await container.lineageService.getAncestors(trackingId));

    const response: AncestorsResponse = { trackingId, ancestors };
    return json(response);
  });

  const getLineage: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const trackingId = pathSegment(req, 3);
    return json(await container.lineageService.tree(trackingId));
  });

  return { submit, getById, getAncestors, getLineage };
}
