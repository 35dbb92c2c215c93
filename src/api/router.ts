/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic; works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { createSubmissionHandlers } from './submissions.js';
import { createLineageHandlers } from './lineage.js';
import { createOutcomeHandlers } from './outcomes.js';
import { createOwnerHandlers } from './owners.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const submissions = createSubmissionHandlers(container);
  const lineage = createLineageHandlers(container);
  const outcomes = createOutcomeHandlers(container);
  const owners = createOwnerHandlers(container);

  const routes: Route[] = [
    // Submissions
    { method: 'POST', pattern: /^\/api\/v1\/submissions\/?$/, handler: submissions.submit },
    { method: 'GET', pattern: /^\/api\/v1\/submissions\/[^/]+\/?$/, handler: submissions.getById },
    { method: 'GET', pattern: /^\/api\/v1\/submissions\/[^/]+\/ancestors\/?$/, handler: submissions.getAncestors },
    { method: 'GET', pattern: /^\/api\/v1\/submissions\/[^/]+\/lineage\/?$/, handler: submissions.getLineage },

    // Outcomes
    { method: 'POST', pattern: /^\/api\/v1\/submissions\/[^/]+\/outcome\/?$/, handler: outcomes.record },
    { method: 'GET', pattern: /^\/api\/v1\/submissions\/[^/]+\/outcome\/?$/, handler: outcomes.get },

    // Lineage
    { method: 'POST', pattern: /^\/api\/v1\/lineage\/?$/, handler: lineage.link },

    // Owners
    { method: 'GET', pattern: /^\/api\/v1\/owners\/[^/]+\/profile\/?$/, handler: owners.getProfile },
    { method: 'GET', pattern: /^\/api\/v1\/owners\/[^/]+\/time-capsule\/?$/, handler: owners.getTimeCapsule },
    { method: 'GET', pattern: /^\/api\/v1\/owners\/[^/]+\/next-question\/?$/, handler: owners.getNextQuestion },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders() });
    }

    const matching = routes.filter((r) => r.pattern.test(url.pathname));
    const route = matching.find((r) => r.method === method);
    if (route) {
      return addCorsHeaders(await route.handler(req, ctx));
    }

    if (matching.length > 0) {
      return errorResponse(405, 'INVALID_REQUEST', `Method ${method} not allowed`, {
        Allow: matching.map((r) => r.method).join(', '),
      });
    }

    return errorResponse(404, 'NOT_FOUND', `No route matches ${method} ${url.pathname}`);
  };

  return { handle, routes };
}

function errorResponse(
  status: number,
  code: string,
  message: string,
  extraHeaders: Record<string, string> = {}
): Response {
  const body: ApiErrorResponse = { error: { code, message } };
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...extraHeaders, ...corsHeaders() },
  });
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
