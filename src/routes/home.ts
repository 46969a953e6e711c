/**
 * Home Routes
 *
 * Plain-text and HTML pages.
 */

import type { Application } from '../../framework/mod.ts';

export function registerHomeRoutes(app: Application): void {
  app.get('/', async (_req, res) => {
    await res.redirect('/static/');
  });

  app.get('/hello', async (req, res) => {
    const name = req.query.get('name') ?? 'world';
    await res.text(`Hello, ${name}!`);
  });

  app.get('/hello/:name', async (req, res) => {
    const name = req.param('name') ?? 'world';
    await res.html(`<h1>Hello, ${escapeHtml(name)}!</h1>`);
  });

  /**
   * Echo the request as the server decoded it
   */
  app.get('/whoami', async (req, res) => {
    await res.json({
      method: req.method,
      path: req.path,
      host: req.host,
      userAgent: req.userAgent,
      accept: req.accept,
      platform: req.platform,
    });
  });
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
