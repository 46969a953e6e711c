/**
 * Static File Serving
 *
 * Handler for a `<prefix>/:filepath*` route. Requests that resolve outside
 * the root or name a missing asset get the fixed 404 page; directories
 * resolve to their index file.
 */

import { join, resolve, sep } from 'node:path';
import { fileSystemAssets, mimeType, type AssetSource } from '../http/assets.ts';
import { AssetNotFoundError, PathTraversalError } from '../http/errors.ts';
import type { Handler } from '../http/types.ts';

export interface StaticOptions {
  assets?: AssetSource;
  /** File served for directory requests (default: index.html) */
  index?: string;
  /** Route parameter holding the requested path (default: filepath) */
  param?: string;
}

/**
 * Resolve a requested path beneath root, rejecting traversal
 */
export function resolveAssetPath(root: string, requested: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requested);
  } catch {
    throw new AssetNotFoundError(requested);
  }

  if (decoded.includes('\0') || decoded.split(/[\\/]/).includes('..')) {
    throw new PathTraversalError(requested);
  }

  const target = join(root, decoded);
  if (target !== root && !target.startsWith(root.endsWith(sep) ? root : root + sep)) {
    throw new PathTraversalError(requested);
  }

  return target;
}

/**
 * Create a handler serving files beneath rootDir
 */
export function staticFiles(rootDir: string, options: StaticOptions = {}): Handler {
  const root = resolve(rootDir);
  const assets = options.assets ?? fileSystemAssets;
  const index = options.index ?? 'index.html';
  const param = options.param ?? 'filepath';

  return async (req, res) => {
    try {
      let target = resolveAssetPath(root, req.param(param) ?? '');
      let asset = await assets.open(target);

      if (asset?.kind === 'directory') {
        target = join(target, index);
        asset = await assets.open(target);
      }

      if (!asset || asset.kind !== 'file') {
        throw new AssetNotFoundError(target);
      }

      res.setHeader('Content-Type', mimeType(target));
      await res.write(asset.data);
    } catch (error) {
      if (error instanceof AssetNotFoundError || error instanceof PathTraversalError) {
        await res.notFound();
        return;
      }
      throw error;
    }
  };
}
