/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Correlation id assigned at the function entry point. */
  requestId: string;
  /** JSON body, parsed and checked by validateBody. */
  body?: Record<string, unknown>;
  /** Set by the error handler when it turns an error into a response. */
  failure?: RequestFailure;
}

export interface RequestFailure {
  code: string;
  message: string;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
  };
}
