/**
 * Route registration helpers shared by the router, groups and the application
 */

import type { Handler } from '../http/types.ts';
import { RouteDefinitionError } from '../http/errors.ts';

export abstract class RouteRegistrar {
  /**
   * Register a route with an explicit method
   */
  abstract add(method: string, pattern: string, handler: Handler): this;

  /**
   * Register a GET route
   */
  get(pattern: string, handler: Handler): this {
    return this.add('GET', pattern, handler);
  }

  /**
   * Register a POST route
   */
  post(pattern: string, handler: Handler): this {
    return this.add('POST', pattern, handler);
  }

  /**
   * Register a PUT route
   */
  put(pattern: string, handler: Handler): this {
    return this.add('PUT', pattern, handler);
  }

  /**
   * Register a PATCH route
   */
  patch(pattern: string, handler: Handler): this {
    return this.add('PATCH', pattern, handler);
  }

  /**
   * Register a DELETE route
   */
  delete(pattern: string, handler: Handler): this {
    return this.add('DELETE', pattern, handler);
  }

  /**
   * Register a HEAD route
   */
  head(pattern: string, handler: Handler): this {
    return this.add('HEAD', pattern, handler);
  }

  /**
   * Register an OPTIONS route
   */
  options(pattern: string, handler: Handler): this {
    return this.add('OPTIONS', pattern, handler);
  }
}

/**
 * Validate a group or static prefix and strip its trailing slash
 */
export function normalizePrefix(prefix: string): string {
  if (!prefix.startsWith('/')) {
    throw new RouteDefinitionError(`Prefix must start with /: ${JSON.stringify(prefix)}`);
  }
  return prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;
}
