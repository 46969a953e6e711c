/**
 * Routing Layer
 *
 * Maps a method and path to a handler, extracting named segments.
 */

export { Router, type RouteDefinition, type RouteMatch } from './router.ts';
export { RouteGroup } from './group.ts';
export { RouteRegistrar, normalizePrefix } from './registrar.ts';
export { compilePattern, matchPattern, type CompiledPattern, type PatternSegment } from './patterns.ts';
