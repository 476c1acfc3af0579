import { readdirSync, statSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import { globToRegExp } from './glob.js';

export interface DiscoverOptions {
  /** Globs matched against the posix path relative to the root. */
  include: string[];
  /** Directory names never descended into. */
  exclude: string[];
}

/**
 * Recursively list OCR text files under `root`, sorted by path. A file
 * path given as `root` is returned as-is.
 */
export function discoverFiles(root: string, options: DiscoverOptions): string[] {
  if (statSync(root).isFile()) return [root];

  const include = options.include.map(globToRegExp);
  const exclude = new Set(options.exclude);
  const found: string[] = [];
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (exclude.has(entry.name) || entry.name.startsWith('.')) continue;
        pending.push(full);
      } else if (entry.isFile()) {
        const rel = relative(root, full).split(sep).join('/');
        if (include.some(re => re.test(rel))) found.push(full);
      }
    }
  }

  return found.sort();
}
