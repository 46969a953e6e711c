/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging.
 */

import { performance } from 'node:perf_hooks';
import type { Middleware } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logger?: Logger;
  logRequest?: boolean;
  logResponse?: boolean;
  logHeaders?: boolean;
  excludePaths?: string[];
}

const DEFAULT_OPTIONS = {
  logRequest: true,
  logResponse: true,
  logHeaders: false,
  excludePaths: ['/health', '/ready', '/favicon.ico'],
};

/**
 * Create logging middleware
 */
export function requestLogger(options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return (next) => async (req, res) => {
    if (opts.excludePaths.some((path) => req.path.startsWith(path))) {
      await next(req, res);
      return;
    }

    const logger = opts.logger ?? getLogger();
    const startTime = performance.now();

    if (opts.logRequest) {
      const context: Record<string, unknown> = { host: req.host };
      if (opts.logHeaders) {
        context.headers = Object.fromEntries(req.headers);
      }
      logger.info(`→ ${req.method} ${req.path}`, context);
    }

    try {
      await next(req, res);
    } finally {
      if (opts.logResponse) {
        const duration = Math.round((performance.now() - startTime) * 100) / 100;
        logger.info(`← ${req.method} ${req.path} ${res.statusCode || '-'}`, { duration });
      }
    }
  };
}
