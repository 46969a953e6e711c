/**
 * Brisk Application Entry Point
 */

import { createApp, extractErrorMessage, loadConfig, requestLogger } from './framework/mod.ts';
import { registerRoutes } from './src/routes/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration (config file, then environment)
  const config = await loadConfig();

  // 2. Create application instance
  const app = createApp({ config });

  // 3. Register global middleware
  app.use(requestLogger({ logger: app.logger }));

  // 4. Register routes
  registerRoutes(app);
  app.serveStatic(
    config.get<string>('static.prefix', '/static'),
    config.get<string>('static.root', './public'),
  );

  process.once('SIGINT', () => {
    app.logger.info('Shutting down');
    app.close().catch((error: unknown) => app.logger.error('Failed to close listener', error));
  });

  // 5. Serve until closed
  await app.start();
}

main().catch((error: unknown) => {
  console.error(`Failed to start Brisk: ${extractErrorMessage(error)}`);
  process.exit(1);
});
