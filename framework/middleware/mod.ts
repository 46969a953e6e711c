/**
 * Middleware Layer
 *
 * Handler wrappers composed around every matched route.
 */

export { MiddlewareChain, conditional, forPath } from './pipeline.ts';
export { requestLogger, type LoggingOptions } from './logging.ts';
export { resolveAssetPath, staticFiles, type StaticOptions } from './static.ts';
