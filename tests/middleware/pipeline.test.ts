import { describe, it, expect } from 'vitest';
import { pipeline } from '../../src/middleware/pipeline.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

describe('pipeline', () => {
  function makeContext(): HandlerContext {
    return { requestId: 'req-1' };
  }

  it('should call the handler directly when no middleware', async () => {
    const handler: Handler = async () => new Response('ok', { status: 200 });

    const res = await pipeline()(handler)(new Request('http://test'), makeContext());

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('should apply middleware in order (left to right)', async () => {
    const order: string[] = [];

    const outer = (next: Handler): Handler => async (req, ctx) => {
      order.push('outer-before');
      const res = await next(req, ctx);
      order.push('outer-after');
      return res;
    };

    const inner = (next: Handler): Handler => async (req, ctx) => {
      order.push('inner-before');
      const res = await next(req, ctx);
      order.push('inner-after');
      return res;
    };

    const handler: Handler = async () => {
      order.push('handler');
      return new Response('ok');
    };

    await pipeline(outer, inner)(handler)(new Request('http://test'), makeContext());

    expect(order).toEqual(['outer-before', 'inner-before', 'handler', 'inner-after', 'outer-after']);
  });

  it('should allow middleware to short-circuit', async () => {
    const blocker = (_next: Handler): Handler => async () =>
      new Response('blocked', { status: 403 });

    const handler: Handler = async () => {
      throw new Error('Should not reach handler');
    };

    const res = await pipeline(blocker)(handler)(new Request('http://test'), makeContext());

    expect(res.status).toBe(403);
    expect(await res.text()).toBe('blocked');
  });

  it('should pass an extended context down the chain', async () => {
    const attachBody = (next: Handler): Handler => async (req, ctx) =>
      next(req, { ...ctx, body: { ownerId: 'owner-a' } });

    const handler: Handler = async (_req, ctx) =>
      new Response(`${ctx.requestId}:${String(ctx.body?.ownerId)}`);

    const res = await pipeline(attachBody)(handler)(new Request('http://test'), makeContext());

    expect(await res.text()).toBe('req-1:owner-a');
  });
});
