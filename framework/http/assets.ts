/**
 * Asset access used by file responses and static serving
 */

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';

export type Asset =
  | { kind: 'file'; data: Buffer }
  | { kind: 'directory' };

/**
 * Opens assets by path; null when nothing exists there
 */
export interface AssetSource {
  open(path: string): Promise<Asset | null>;
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Asset source backed by the local filesystem
 */
export const fileSystemAssets: AssetSource = {
  async open(path: string): Promise<Asset | null> {
    try {
      const info = await stat(path);
      if (info.isDirectory()) {
        return { kind: 'directory' };
      }
      return { kind: 'file', data: await readFile(path) };
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  },
};

/**
 * Common MIME types
 */
const MIME_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  htm: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  mjs: 'application/javascript; charset=utf-8',
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
  pdf: 'application/pdf',
};

/**
 * Content type for a path, from its extension
 */
export function mimeType(path: string): string {
  const ext = extname(path).slice(1).toLowerCase();
  return MIME_TYPES[ext] ?? 'application/octet-stream';
}
