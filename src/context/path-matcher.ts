import { basename } from 'path';
import { minimatch } from 'minimatch';

const WILDCARD_CHARS = /[*?[]/;

export type MatchMode = 'glob' | 'exact';

export interface PathMatcher {
  mode: MatchMode;
  pattern: string;
  matches(displayPath: string): boolean;
}

export function hasWildcard(pattern: string): boolean {
  return WILDCARD_CHARS.test(pattern);
}

/**
 * Builds a matcher for context keys. The mode is picked once from the
 * pattern: wildcard patterns use shell-glob rules (a pattern without `/`
 * is tested against the file name), plain names must equal the display path
 * or its file name.
 */
export function createPathMatcher(pattern: string): PathMatcher {
  if (hasWildcard(pattern)) {
    return {
      mode: 'glob',
      pattern,
      matches: (displayPath) => minimatch(displayPath, pattern, { dot: true, matchBase: true }),
    };
  }

  const normalized = pattern.replace(/\/+$/, '');
  return {
    mode: 'exact',
    pattern,
    matches: (displayPath) => displayPath === normalized || basename(displayPath) === normalized,
  };
}
