/**
 * Route Group
 *
 * Scoped registrar that prepends a prefix to every pattern it registers.
 */

import type { Handler } from '../http/types.ts';
import { RouteRegistrar, normalizePrefix } from './registrar.ts';

interface RouteTable {
  add(method: string, pattern: string, handler: Handler): unknown;
}

/**
 * Route group for organizing related routes
 */
export class RouteGroup extends RouteRegistrar {
  private table: RouteTable;
  readonly prefix: string;

  constructor(prefix: string, table: RouteTable) {
    super();
    this.prefix = normalizePrefix(prefix);
    this.table = table;
  }

  /**
   * Add a route to the underlying table
   */
  add(method: string, pattern: string, handler: Handler): this {
    this.table.add(method, this.prefix + pattern, handler);
    return this;
  }

  /**
   * Create a nested group
   */
  group(prefix: string): RouteGroup {
    return new RouteGroup(this.prefix + normalizePrefix(prefix), this.table);
  }
}
