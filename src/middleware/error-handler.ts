/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors are
 * logged in full and become an opaque 500. Either way the code and message
 * are left on ctx.failure for the request logger.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          ctx.failure = { code: err.code, message: err.message };
          const body: ApiErrorResponse = {
            error: {
              code: err.code,
              message: err.message,
              ...(err.details && { details: err.details }),
            },
          };

          return new Response(JSON.stringify(body), {
            status: err.statusCode,
            headers: JSON_HEADERS,
          });
        }

        const message = err instanceof Error ? err.message : String(err);
        ctx.failure = { code: 'INTERNAL_ERROR', message };
        logProvider.error('unhandled error', {
          requestId: ctx.requestId,
          error: message,
          stack: err instanceof Error ? err.stack : undefined,
        });

        // Unknown error: internals stay in the log
        const body: ApiErrorResponse = {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
            details: { requestId: ctx.requestId },
          },
        };

        return new Response(JSON.stringify(body), {
          status: 500,
          headers: JSON_HEADERS,
        });
      }
    };
  };
}
