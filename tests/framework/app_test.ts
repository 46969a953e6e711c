/**
 * Application Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import { Application, createApp, type ApplicationOptions } from '../../framework/app.ts';
import { Config } from '../../framework/config/config.ts';
import { RouteDefinitionError } from '../../framework/http/errors.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import { connectionWith, parseResponse } from '../helpers/connection.ts';

const PUBLIC_DIR = fileURLToPath(new URL('../fixtures/public', import.meta.url));

function quietApp(options: ApplicationOptions = {}): { app: Application; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { app: createApp({ ...options, logger }), entries };
}

async function request(app: Application, raw: string): Promise<ReturnType<typeof parseResponse>> {
  const conn = connectionWith(raw);
  await app.handleConnection(conn);
  return parseResponse(conn.output());
}

describe('Application', () => {
  it('registers and serves routes', async () => {
    const { app } = quietApp();
    app.get('/hello/:name', async (req, res) => {
      await res.text(`Hello, ${req.param('name')}!`);
    });

    const response = await request(app, 'GET /hello/brisk HTTP/1.1\r\n\r\n');
    assert.equal(response.statusLine, 'HTTP/1.1 200 OK');
    assert.equal(response.body, 'Hello, brisk!');
  });

  it('registers grouped routes', async () => {
    const { app } = quietApp();
    const api = app.group('/api');
    api.post('/items', async (_req, res) => {
      await res.json({ created: true }, 201);
    });

    assert.deepEqual(
      app.getRoutes().map((route) => `${route.method} ${route.pattern}`),
      ['POST /api/items'],
    );
    const response = await request(app, 'POST /api/items HTTP/1.1\r\n\r\n');
    assert.equal(response.statusLine, 'HTTP/1.1 201 Created');
  });

  it('runs global middleware', async () => {
    const { app } = quietApp();
    app.use((next) => async (req, res) => {
      res.setHeader('X-Powered-By', 'brisk');
      await next(req, res);
    });
    app.get('/', async (_req, res) => {
      await res.text('home');
    });

    const response = await request(app, 'GET / HTTP/1.1\r\n\r\n');
    assert.deepEqual(response.headers[0], ['X-Powered-By', 'brisk']);
  });

  it('serves static files under a prefix', async () => {
    const { app } = quietApp();
    app.serveStatic('/static/', PUBLIC_DIR);

    assert.deepEqual(app.getRoutes().map((route) => route.pattern), ['/static/:filepath*']);

    const css = await request(app, 'GET /static/app.css HTTP/1.1\r\n\r\n');
    assert.equal(css.body, 'body { margin: 0; }\n');

    const index = await request(app, 'GET /static/ HTTP/1.1\r\n\r\n');
    assert.equal(index.body, '<h1>Fixture home</h1>\n');

    const missing = await request(app, 'GET /static/nope.txt HTTP/1.1\r\n\r\n');
    assert.equal(missing.statusLine, 'HTTP/1.1 404 Not Found');

    const escape = await request(app, 'GET /static/../config.json HTTP/1.1\r\n\r\n');
    assert.equal(escape.statusLine, 'HTTP/1.1 404 Not Found');
  });

  it('rejects a static prefix without a leading slash', () => {
    const { app } = quietApp();
    assert.throws(() => app.serveStatic('static', PUBLIC_DIR), RouteDefinitionError);
  });

  it('takes server limits from config', async () => {
    const { app } = quietApp({ config: { server: { maxBodySize: 8 } } });
    app.post('/upload', async (_req, res) => {
      await res.text('ok');
    });

    const response = await request(
      app,
      'POST /upload HTTP/1.1\r\nContent-Length: 16\r\n\r\n0123456789abcdef',
    );
    assert.equal(response.statusLine, 'HTTP/1.1 413 Payload Too Large');
  });

  it('accepts a Config instance', () => {
    const config = new Config({ port: 9999 });
    const { app } = quietApp({ config });
    assert.equal(app.config, config);
    assert.equal(app.config.get('port'), 9999);
  });

  it('builds its logger from config when none is given', () => {
    const app = createApp({ config: { logLevel: 'error', logFormat: 'json' } });
    assert.equal(app.logger.isLevelEnabled('warn'), false);
    assert.equal(app.logger.isLevelEnabled('error'), true);
  });

  it('closes cleanly when never started', async () => {
    const { app } = quietApp();
    await app.close();
  });
});
