/**
 * HTTP Type Definitions
 */

import type { BriskRequest } from './request.ts';
import type { BriskResponse } from './response.ts';

/**
 * Path parameters captured by a route pattern
 */
export type Params = Record<string, string>;

/**
 * HTTP request handler function
 */
export type Handler = (req: BriskRequest, res: BriskResponse) => Promise<void> | void;

/**
 * Middleware wraps a handler into another handler
 */
export type Middleware = (next: Handler) => Handler;
