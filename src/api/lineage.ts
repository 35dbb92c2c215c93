/**
 * Lineage endpoint.
 * POST /api/v1/lineage Link a refinement to the idea it improves on
 */

import { pipeline, validateBody, bodyOf } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { LinkIdeasResponse } from '../types/api.js';
import { REFINEMENT_TYPES, isRefinementType } from '../types/models.js';
import { ValidationError } from '../errors.js';
import { json, optionalString, requiredNumber, requiredString } from './http.js';

const linkSchema: BodySchema = {
  parentId: { type: 'string', required: true, maxLength: 100 },
  childId: { type: 'string', required: true, maxLength: 100 },
  refinementType: { type: 'string', required: true, enum: REFINEMENT_TYPES },
  depthIncrease: { type: 'number', required: true, min: 0, max: 1 },
  question: { type: 'string', required: false, maxLength: 1000 },
};

export function createLineageHandlers(container: Container) {
  const link: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(linkSchema)
  )(async (_req, ctx) => {
    const body = bodyOf(ctx);

    const refinementType = requiredString(body, 'refinementType');
    if (!isRefinementType(refinementType)) {
      throw new ValidationError(`Invalid refinementType: "${refinementType}"`);
    }

    const edgeId = await container.lineageService.link({
      parentId: requiredString(body, 'parentId'),
      childId: requiredString(body, 'childId'),
      refinementType,
      depthIncrease: requiredNumber(body, 'depthIncrease'),
      question: optionalString(body, 'question'),
    });

    const response: LinkIdeasResponse = { edgeId };
    return json(response, 201);
  });

  return { link };
}
