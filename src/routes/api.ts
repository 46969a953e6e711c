/**
 * API Routes
 *
 * JSON endpoints under /api.
 */

import { BadRequestError, type Application } from '../../framework/mod.ts';

interface User {
  id: string;
  name: string;
}

const users = new Map<string, User>([
  ['1', { id: '1', name: 'Ada' }],
  ['2', { id: '2', name: 'Grace' }],
]);

function isUserInput(value: unknown): value is { name: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    value.name.length > 0
  );
}

export function registerApiRoutes(app: Application): void {
  const api = app.group('/api');

  api.get('/health', async (_req, res) => {
    await res.json({ status: 'healthy', uptime: process.uptime() });
  });

  api.get('/users', async (_req, res) => {
    await res.json([...users.values()]);
  });

  api.get('/users/:id', async (req, res) => {
    const user = users.get(req.param('id') ?? '');
    if (!user) {
      await res.notFound();
      return;
    }
    await res.json(user);
  });

  api.post('/users', async (req, res) => {
    const input = await req.json();
    if (!isUserInput(input)) {
      throw new BadRequestError('Expected {"name": string}');
    }
    const user = { id: String(users.size + 1), name: input.name };
    users.set(user.id, user);
    await res.json(user, 201);
  });

  api.post('/echo', async (req, res) => {
    const contentType = req.contentType ?? '';
    if (contentType.startsWith('application/x-www-form-urlencoded')) {
      const form = await req.form();
      await res.json(Object.fromEntries(form));
      return;
    }
    await res.write(await req.text());
  });

  /**
   * Nested path capture, e.g. /api/files/docs/readme.md
   */
  api.get('/files/:path*', async (req, res) => {
    await res.json({ path: req.param('path') ?? '' });
  });
}
