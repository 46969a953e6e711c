/**
 * Middleware Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MiddlewareChain, conditional, forPath } from '../../framework/middleware/pipeline.ts';
import { requestLogger } from '../../framework/middleware/logging.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import type { Handler, Middleware } from '../../framework/http/types.ts';
import { requestFor, responseFor } from '../helpers/http.ts';

function tracing(name: string, calls: string[]): Middleware {
  return (next) => async (req, res) => {
    calls.push(`${name}:before`);
    await next(req, res);
    calls.push(`${name}:after`);
  };
}

function capture(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: new Logger({ level: 'debug', output: (entry) => entries.push(entry) }), entries };
}

describe('MiddlewareChain', () => {
  it('runs the first registered middleware outermost', async () => {
    const calls: string[] = [];
    const chain = new MiddlewareChain().use(tracing('a', calls)).use(tracing('b', calls));
    const handler = chain.apply(async () => {
      calls.push('handler');
    });

    const { res } = responseFor();
    await handler(requestFor(['GET / HTTP/1.1']), res);

    assert.deepEqual(calls, ['a:before', 'b:before', 'handler', 'b:after', 'a:after']);
    assert.equal(chain.length, 2);
  });

  it('returns the handler unchanged when empty', () => {
    const handler: Handler = async () => {};
    assert.equal(new MiddlewareChain().apply(handler), handler);
  });

  it('lets middleware short-circuit the handler', async () => {
    let reached = false;
    const chain = new MiddlewareChain().use(() => async (_req, res) => {
      await res.text('blocked', 403);
    });
    const handler = chain.apply(async () => {
      reached = true;
    });

    const { conn, res } = responseFor();
    await handler(requestFor(['GET / HTTP/1.1']), res);

    assert.equal(reached, false);
    assert.ok(conn.output().startsWith('HTTP/1.1 403 Forbidden\r\n'));
  });
});

describe('conditional and forPath', () => {
  it('applies middleware only when the condition holds', async () => {
    const calls: string[] = [];
    const mw = conditional((method) => method === 'POST', tracing('post-only', calls));
    const handler = mw(async () => {
      calls.push('handler');
    });

    await handler(requestFor(['GET / HTTP/1.1']), responseFor().res);
    await handler(requestFor(['POST / HTTP/1.1']), responseFor().res);

    assert.deepEqual(calls, ['handler', 'post-only:before', 'handler', 'post-only:after']);
  });

  it('applies middleware under a path prefix', async () => {
    const calls: string[] = [];
    const handler = forPath('/admin', tracing('admin', calls))(async (req) => {
      calls.push(req.path);
    });

    await handler(requestFor(['GET /admin/users HTTP/1.1']), responseFor().res);
    await handler(requestFor(['GET /public HTTP/1.1']), responseFor().res);

    assert.deepEqual(calls, ['admin:before', '/admin/users', 'admin:after', '/public']);
  });
});

describe('requestLogger', () => {
  it('logs the request and the response status', async () => {
    const { logger, entries } = capture();
    const handler = requestLogger({ logger })(async (_req, res) => {
      await res.text('ok');
    });

    await handler(requestFor(['GET /users HTTP/1.1', 'Host: example.test']), responseFor().res);

    assert.deepEqual(entries.map((entry) => entry.message), ['→ GET /users', '← GET /users 200']);
    assert.deepEqual(entries[0].context, { host: 'example.test' });
    assert.equal(typeof entries[1].context?.duration, 'number');
  });

  it('includes headers when asked', async () => {
    const { logger, entries } = capture();
    const handler = requestLogger({ logger, logHeaders: true, logResponse: false })(async () => {});

    await handler(requestFor(['GET / HTTP/1.1', 'Accept: */*']), responseFor().res);

    assert.equal(entries.length, 1);
    assert.deepEqual(entries[0].context, { host: '', headers: { Accept: '*/*' } });
  });

  it('skips excluded paths', async () => {
    const { logger, entries } = capture();
    const handler = requestLogger({ logger })(async () => {});

    await handler(requestFor(['GET /health HTTP/1.1']), responseFor().res);

    assert.equal(entries.length, 0);
  });

  it('logs the response line when the handler fails', async () => {
    const { logger, entries } = capture();
    const handler = requestLogger({ logger })(async () => {
      throw new Error('boom');
    });

    await assert.rejects(async () => handler(requestFor(['GET /boom HTTP/1.1']), responseFor().res), /boom/);
    assert.equal(entries[1].message, '← GET /boom -');
  });
});
