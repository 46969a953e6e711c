/**
 * Request Decoder
 *
 * Turns the line records of a request head into its parts: request line,
 * target split into path and query, and a header mapping.
 */

import { BadRequestError, MalformedRequestLineError } from './errors.ts';

export interface DecodedHead {
  method: string;
  target: string;
  path: string;
  query: URLSearchParams;
  version: string;
  /** Header names as received */
  headers: Map<string, string>;
  /** Declared body length, null when the header is absent */
  contentLength: number | null;
}

/**
 * Parse `METHOD SP TARGET SP VERSION`
 */
export function parseRequestLine(line: string): { method: string; target: string; version: string } {
  const tokens = line.split(' ');
  const [method, target, version = ''] = tokens;
  if (tokens.length < 2 || !method || !target) {
    throw new MalformedRequestLineError(line);
  }
  return { method, target, version };
}

/**
 * Split a request target into path and query, dropping any fragment
 */
export function splitTarget(target: string): { path: string; query: URLSearchParams } {
  const hash = target.indexOf('#');
  const withoutFragment = hash >= 0 ? target.slice(0, hash) : target;
  const mark = withoutFragment.indexOf('?');
  if (mark < 0) {
    return { path: withoutFragment, query: new URLSearchParams() };
  }
  return {
    path: withoutFragment.slice(0, mark),
    query: new URLSearchParams(withoutFragment.slice(mark + 1)),
  };
}

/**
 * Parse header lines up to the first empty line.
 *
 * Each line is split on its first colon; lines without one are skipped and
 * a repeated name replaces the earlier value.
 */
export function parseHeaders(lines: string[]): Map<string, string> {
  const headers = new Map<string, string>();
  const seen = new Map<string, string>();

  for (const line of lines) {
    if (line === '') break;

    const colon = line.indexOf(':');
    if (colon <= 0) continue;

    const name = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    if (!name) continue;

    const previous = seen.get(name.toLowerCase());
    if (previous !== undefined) {
      headers.delete(previous);
    }
    seen.set(name.toLowerCase(), name);
    headers.set(name, value);
  }

  return headers;
}

function parseContentLength(headers: Map<string, string>): number | null {
  for (const [name, value] of headers) {
    if (name.toLowerCase() !== 'content-length') continue;
    if (!/^\d+$/.test(value)) {
      throw new BadRequestError('Invalid Content-Length');
    }
    return Number(value);
  }
  return null;
}

/**
 * Decode the head lines produced by the wire reader
 */
export function decodeHead(lines: string[]): DecodedHead {
  const { method, target, version } = parseRequestLine(lines[0] ?? '');
  const { path, query } = splitTarget(target);
  const headers = parseHeaders(lines.slice(1));

  return {
    method,
    target,
    path,
    query,
    version,
    headers,
    contentLength: parseContentLength(headers),
  };
}
