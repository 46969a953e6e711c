/**
 * URL Router
 *
 * Ordered route table with linear first-match lookup. Registration order is
 * the only tie-break between patterns that match the same path.
 *
 * Registration and lookup are synchronous, so on the event loop each runs as
 * a critical section and the table stays consistent while routes are added
 * during serving. Handlers run only after lookup has returned.
 */

import type { Handler, Middleware, Params } from '../http/types.ts';
import { RouteDefinitionError } from '../http/errors.ts';
import { MiddlewareChain } from '../middleware/pipeline.ts';
import { compilePattern, matchPattern, type CompiledPattern } from './patterns.ts';
import { RouteGroup } from './group.ts';
import { RouteRegistrar } from './registrar.ts';

export interface RouteDefinition {
  method: string;
  pattern: string;
  handler: Handler;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Params;
  /** Route handler wrapped in the middleware chain */
  handler: Handler;
}

interface CompiledRoute {
  definition: RouteDefinition;
  compiled: CompiledPattern;
}

/**
 * URL Router for Brisk
 */
export class Router extends RouteRegistrar {
  private routes: CompiledRoute[] = [];
  private chain = new MiddlewareChain();

  /**
   * Add global middleware
   */
  use(middleware: Middleware): this {
    this.chain.use(middleware);
    return this;
  }

  /**
   * Add a route with explicit method
   */
  add(method: string, pattern: string, handler: Handler): this {
    if (!method) {
      throw new RouteDefinitionError('Route method must not be empty');
    }
    if (!pattern.startsWith('/')) {
      throw new RouteDefinitionError(`Route pattern must start with /: ${JSON.stringify(pattern)}`);
    }

    const definition: RouteDefinition = Object.freeze({ method, pattern, handler });
    this.routes.push({ definition, compiled: compilePattern(pattern) });
    return this;
  }

  /**
   * Create a registrar that prefixes every pattern
   */
  group(prefix: string): RouteGroup {
    return new RouteGroup(prefix, this);
  }

  /**
   * Find the first route matching method and path
   */
  find(method: string, path: string): { route: RouteDefinition; params: Params } | null {
    for (const { definition, compiled } of this.routes) {
      if (definition.method !== method) continue;

      const params = matchPattern(compiled, path);
      if (params) {
        return { route: definition, params };
      }
    }

    return null;
  }

  /**
   * Match a request to a route and wrap its handler in the middleware chain
   */
  match(method: string, path: string): RouteMatch | null {
    const found = this.find(method, path);
    if (!found) return null;

    return {
      ...found,
      handler: this.chain.apply(found.route.handler),
    };
  }

  /**
   * Get all registered routes (for debugging/admin)
   */
  getRoutes(): RouteDefinition[] {
    return this.routes.map(({ definition }) => definition);
  }
}
