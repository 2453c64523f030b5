import path from 'node:path';

/** Normalize to posix-style path separators. */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/').replace(/\\/g, '/');
}

/** Plain code-unit ordering, independent of locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare posix paths one segment at a time, so `a/y.c` sorts before
 * `a-b/x.c` (a shorter segment that is a prefix comes first).
 */
export function comparePathSegments(a: string, b: string): number {
  const sa = a.split('/');
  const sb = b.split('/');
  const n = Math.min(sa.length, sb.length);
  for (let i = 0; i < n; i++) {
    const c = compareStrings(sa[i], sb[i]);
    if (c !== 0) return c;
  }
  return sa.length - sb.length;
}
