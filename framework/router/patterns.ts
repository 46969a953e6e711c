/**
 * Route Patterns
 *
 * A pattern is a `/`-delimited template. Each segment is a literal, a named
 * capture (`:name`) or a wildcard capture (`:name*`) that takes the rest of
 * the path. Segment kinds are derived once when the pattern is compiled.
 */

import type { Params } from '../http/types.ts';

export type PatternSegment =
  | { kind: 'literal'; value: string }
  | { kind: 'param'; name: string }
  | { kind: 'wildcard'; name: string };

export interface CompiledPattern {
  source: string;
  segments: PatternSegment[];
}

/**
 * Compile a pattern string into segments
 */
export function compilePattern(source: string): CompiledPattern {
  const segments = source.split('/').map((part): PatternSegment => {
    if (part.startsWith(':') && part.length > 1) {
      if (part.endsWith('*') && part.length > 2) {
        return { kind: 'wildcard', name: part.slice(1, -1) };
      }
      return { kind: 'param', name: part.slice(1) };
    }
    return { kind: 'literal', value: part };
  });

  return { source, segments };
}

/**
 * Match a concrete path against a compiled pattern.
 *
 * Returns the captured parameters, or null when the path does not fit.
 */
export function matchPattern(pattern: CompiledPattern, path: string): Params | null {
  const parts = path.split('/');
  const params: Params = {};

  for (let i = 0; i < pattern.segments.length; i++) {
    const segment = pattern.segments[i];

    if (segment.kind === 'wildcard') {
      params[segment.name] = parts.slice(i).join('/');
      return params;
    }

    if (i >= parts.length) {
      return null;
    }

    if (segment.kind === 'param') {
      params[segment.name] = parts[i];
    } else if (segment.value !== parts[i]) {
      return null;
    }
  }

  if (pattern.segments.length !== parts.length) {
    return null;
  }

  return params;
}
