import { isAbsolute, relative, resolve } from 'path';

/**
 * True when `path` is `directory` itself or anywhere below it
 */
export function isInsideDirectory(directory: string, path: string): boolean {
  const rel = relative(resolve(directory), resolve(path));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * The most specific root containing `path`, so nested watch roots map a file
 * to the closest one.
 */
export function findWatchRoot(roots: readonly string[], path: string): string | null {
  let best: string | null = null;
  for (const root of roots) {
    if (isInsideDirectory(root, path) && resolve(root) !== resolve(path)) {
      if (best === null || resolve(root).length > best.length) {
        best = resolve(root);
      }
    }
  }
  return best;
}
