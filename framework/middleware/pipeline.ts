/**
 * Middleware Chain
 *
 * Ordered list of handler transformers (onion model). The first registered
 * middleware ends up outermost: it sees the request first and the response
 * last.
 */

import type { Handler, Middleware } from '../http/types.ts';

/**
 * Middleware chain for request processing
 */
export class MiddlewareChain {
  private middleware: Middleware[] = [];

  /**
   * Add middleware to the end of the chain
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Get the number of middleware in the chain
   */
  get length(): number {
    return this.middleware.length;
  }

  /**
   * Wrap a handler: mw[0](mw[1](...mw[n-1](handler)))
   */
  apply(handler: Handler): Handler {
    let wrapped = handler;
    for (let i = this.middleware.length - 1; i >= 0; i--) {
      wrapped = this.middleware[i](wrapped);
    }
    return wrapped;
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (method: string, path: string) => boolean,
  middleware: Middleware
): Middleware {
  return (next) => {
    const wrapped = middleware(next);
    return (req, res) => (condition(req.method, req.path) ? wrapped(req, res) : next(req, res));
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath(pathPrefix: string, middleware: Middleware): Middleware {
  return conditional((_method, path) => path.startsWith(pathPrefix), middleware);
}
