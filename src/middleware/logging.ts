/**
 * Request logging middleware.
 * One event per request with method, path, status, duration and request id.
 * Requests about a single submission or owner also carry its trackingId or
 * ownerId, and rejected requests carry the errorCode and error message the
 * error handler answered with (validation failures included).
 *
 * Level mapping:
 *   2xx → info
 *   4xx → warn
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware, RequestFailure } from './pipeline.js';

const API_PREFIX = '/api/v1/';

const SUBJECT_FIELDS = new Map([
  ['submissions', 'trackingId'],
  ['owners', 'ownerId'],
]);

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

/**
 * `{ trackingId }` for /api/v1/submissions/:id/..., `{ ownerId }` for
 * /api/v1/owners/:id/..., nothing otherwise. The segment is logged as sent.
 */
export function routeSubject(path: string): Record<string, string> {
  if (!path.startsWith(API_PREFIX)) return {};
  const [collection, id] = path.slice(API_PREFIX.length).split('/');
  const field = SUBJECT_FIELDS.get(collection);
  return field && id ? { [field]: id } : {};
}

function withFields(fields: Record<string, unknown>): Pick<RequestLogEvent, 'fields'> {
  return Object.keys(fields).length > 0 ? { fields } : {};
}

function failureFields(failure: RequestFailure | undefined): Record<string, string> {
  return failure ? { errorCode: failure.code, error: failure.message } : {};
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const method = req.method;
      const path = new URL(req.url).pathname;
      const subject = routeSubject(path);
      const start = performance.now();

      try {
        const response = await next(req, ctx);
        const durationMs = Math.round(performance.now() - start);
        const status = response.status;

        const event: RequestLogEvent = {
          level: levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          requestId: ctx.requestId,
          ...withFields({ ...subject, ...failureFields(ctx.failure) }),
        };

        logProvider.log(event);
        return response;
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: RequestLogEvent = {
          level: 'error',
          message: `${method} ${path} → 500 (${durationMs}ms)`,
          method,
          path,
          status: 500,
          durationMs,
          requestId: ctx.requestId,
          fields: {
            ...subject,
            error: err instanceof Error ? err.message : String(err),
          },
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
