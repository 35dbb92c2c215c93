import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware, routeSubject } from '../../src/middleware/logging.js';
import { createErrorHandler } from '../../src/middleware/error-handler.js';
import { validateBody } from '../../src/middleware/validate-body.js';
import { pipeline } from '../../src/middleware/pipeline.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';
import { NotFoundError } from '../../src/errors.js';
import type { LogEvent, RequestLogEvent } from '../../src/providers/ILogProvider.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://example.com${path}`, { method });
}

function asRequestEvent(event: LogEvent): RequestLogEvent {
  if (!('requestId' in event)) throw new Error('not a request log event');
  return event as RequestLogEvent;
}


describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: Middleware;
  let ctx: HandlerContext;

  beforeEach(() => {
    ctx = { requestId: 'req-7' };
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  it('should log a successful request at info', async () => {
    const handler: Handler = async () => new Response('{}', { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/submissions/IDEA-AAAAAA'), ctx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    const event = asRequestEvent(logProvider.events[0]);
    expect(event.level).toBe('info');
    expect(event.method).toBe('GET');
    expect(event.path).toBe('/api/v1/submissions/IDEA-AAAAAA');
    expect(event.status).toBe(200);
    expect(event.requestId).toBe('req-7');
    expect(event.durationMs).toBeGreaterThanOrEqual(0);
    expect(event.message).toMatch(/^GET \/api\/v1\/submissions\/IDEA-AAAAAA → 200 \(\d+ms\)$/);
    expect(event.fields).toEqual({ trackingId: 'IDEA-AAAAAA' });
  });

  it('should log client errors at warn', async () => {
    const handler: Handler = async () => new Response('{}', { status: 404 });

    await middleware(handler)(makeRequest('GET', '/api/v1/owners/ghost/profile'), ctx);

    expect(logProvider.events[0].level).toBe('warn');
  });

  it('should log server errors at error', async () => {
    const handler: Handler = async () => new Response('{}', { status: 503 });

    await middleware(handler)(makeRequest('POST', '/api/v1/lineage'), ctx);

    expect(logProvider.events[0].level).toBe('error');
  });

  it('should log and re-throw handler exceptions', async () => {
    const handler: Handler = async () => {
      throw new Error('store unavailable');
    };

    await expect(
      middleware(handler)(makeRequest('POST', '/api/v1/submissions'), ctx)
    ).rejects.toThrow('store unavailable');

    const event = asRequestEvent(logProvider.events[0]);
    expect(event.level).toBe('error');
    expect(event.status).toBe(500);
    expect(event.fields).toEqual({ error: 'store unavailable' });
  });

  it('should log the owner and the error code of a rejected request', async () => {
    const handler: Handler = async () => {
      throw new NotFoundError('No submissions for owner "ghost"');
    };
    const wrapped = pipeline(middleware, createErrorHandler(logProvider))(handler);

    const response = await wrapped(makeRequest('GET', '/api/v1/owners/ghost/profile'), ctx);

    expect(response.status).toBe(404);
    const event = asRequestEvent(logProvider.events[0]);
    expect(event.level).toBe('warn');
    expect(event.fields).toEqual({
      ownerId: 'ghost',
      errorCode: 'NOT_FOUND',
      error: 'No submissions for owner "ghost"',
    });
  });

  it('should log why a body failed validation', async () => {
    const handler: Handler = async () => new Response('{}', { status: 200 });
    const wrapped = pipeline(
      middleware,
      createErrorHandler(logProvider),
      validateBody({ result: { type: 'number', required: true } })
    )(handler);
    const req = new Request('https://example.com/api/v1/submissions/IDEA-AAAAAA/outcome', {
      method: 'POST',
      body: JSON.stringify({ source: 'review' }),
    });

    const response = await wrapped(req, ctx);

    expect(response.status).toBe(400);
    const event = asRequestEvent(logProvider.events[0]);
    expect(event.fields).toEqual({
      trackingId: 'IDEA-AAAAAA',
      errorCode: 'INVALID_REQUEST',
      error: 'result is required',
    });
  });

  it('should leave fields off when there is nothing to add', async () => {
    const handler: Handler = async () => new Response('{}', { status: 201 });

    await middleware(handler)(makeRequest('POST', '/api/v1/lineage'), ctx);

    expect(logProvider.events[0].fields).toBeUndefined();
  });
});

describe('routeSubject', () => {
  it('should name the submission or owner a path is about', () => {
    expect(routeSubject('/api/v1/submissions/IDEA-ABC234/ancestors')).toEqual({
      trackingId: 'IDEA-ABC234',
    });
    expect(routeSubject('/api/v1/owners/owner-a/time-capsule')).toEqual({ ownerId: 'owner-a' });
  });

  it('should be empty for collection routes and other paths', () => {
    expect(routeSubject('/api/v1/submissions')).toEqual({});
    expect(routeSubject('/api/v1/lineage')).toEqual({});
    expect(routeSubject('/health')).toEqual({});
  });
});
