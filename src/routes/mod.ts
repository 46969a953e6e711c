/**
 * Application Routes
 */

import type { Application } from '../../framework/mod.ts';
import { registerApiRoutes } from './api.ts';
import { registerHomeRoutes } from './home.ts';

/**
 * Register all application routes
 */
export function registerRoutes(app: Application): void {
  registerHomeRoutes(app);
  registerApiRoutes(app);
}
