/**
 * A reviewed path and a work-order path name the same shot when they share
 * enough trailing segments; the storage roots in front of them differ.
 */

// Matches sharing only the last segment (a filename or a resolution folder)
// are coincidental.
export const MIN_SHARED_SEPARATORS = 2;

const DRIVE_LETTER = /^\w:\//;

function reverse(value: string): string {
  return [...value].reverse().join('');
}

function segments(path: string): string[] {
  return path.split('/').filter((segment) => segment !== '' && segment !== '.');
}

/**
 * Longest common sub-path of two paths, anchored at their ends. Segments
 * must match whole.
 *
 * /images1/starwars/reel1/partA/1920x1080 and
 * /hpsans13/production/starwars/reel1/partA/1920x1080 → /starwars/reel1/partA/1920x1080
 */
export function reversedCommonPath(a: string, b: string): string {
  const left = segments(reverse(a));
  const right = segments(reverse(b));
  const common: string[] = [];

  for (let i = 0; i < Math.min(left.length, right.length); i += 1) {
    if (left[i] !== right[i]) break;
    common.push(left[i]);
  }

  if (common.length === 0) return '';
  const forward = reverse(common.join('/'));
  return DRIVE_LETTER.test(forward) ? forward : `/${forward}`;
}

function countSeparators(path: string): number {
  let count = 0;
  for (const char of path) {
    if (char === '/') count += 1;
  }
  return count;
}

export type PathMatch = {
  canonicalPath: string;
  commonPath: string;
};

/**
 * First canonical path, in work-order order, that shares at least
 * MIN_SHARED_SEPARATORS separators worth of trailing path with the reviewed
 * path. Later candidates are never considered once one qualifies.
 */
export function reconcilePath(reviewedPath: string, canonicalPaths: readonly string[]): PathMatch | null {
  for (const canonicalPath of canonicalPaths) {
    const commonPath = reversedCommonPath(canonicalPath, reviewedPath);
    if (countSeparators(commonPath) >= MIN_SHARED_SEPARATORS) {
      return { canonicalPath, commonPath };
    }
  }
  return null;
}
