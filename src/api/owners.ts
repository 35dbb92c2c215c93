/**
 * Owner endpoints.
 * GET /api/v1/owners/:ownerId/profile         Recompute and return the accuracy profile
 * GET /api/v1/owners/:ownerId/time-capsule    Chronological history (?since=ISO date)
 * GET /api/v1/owners/:ownerId/next-question   Coach prompt for the next refinement
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { TimeCapsuleResponse } from '../types/api.js';
import { collect } from '../services/sequence.js';
import { json, parseDate, pathSegment } from './http.js';

export function createOwnerHandlers(container: Container) {
  const getProfile: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const ownerId = pathSegment(req, 3);
    return json(await container.reputationService.getProfile(ownerId));
  });

  const getTimeCapsule: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const ownerId = pathSegment(req, 3);
    const sinceParam = new URL(req.url).searchParams.get('since');
    const since = sinceParam ? parseDate(sinceParam, 'since') : undefined;

    const entries = await collect(container.timeCapsuleService.get(ownerId, since));

    const response: TimeCapsuleResponse = {
      ownerId,
      since: since?.toISOString() ?? null,
      entries,
    };
    return json(response);
  });

  const getNextQuestion: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async (req) => {
    const ownerId = pathSegment(req, 3);
    return json(await container.coachService.nextQuestion(ownerId));
  });

  return { getProfile, getTimeCapsule, getNextQuestion };
}
