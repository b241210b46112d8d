import { describe, it, expect } from 'vitest';
import { createPathMatcher, hasWildcard } from '../../src/context/path-matcher.js';

describe('hasWildcard', () => {
  it('should detect glob characters', () => {
    expect(hasWildcard('*.ts')).toBe(true);
    expect(hasWildcard('file?.md')).toBe(true);
    expect(hasWildcard('[ab].txt')).toBe(true);
    expect(hasWildcard('src/main.ts')).toBe(false);
  });
});

describe('createPathMatcher', () => {
  it('should select glob mode for wildcard patterns', () => {
    const matcher = createPathMatcher('*.ts');
    expect(matcher.mode).toBe('glob');
    expect(matcher.matches('main.ts')).toBe(true);
    expect(matcher.matches('project/src/main.ts')).toBe(true);
    expect(matcher.matches('project/README.md')).toBe(false);
  });

  it('should match path globs against the whole display path', () => {
    const matcher = createPathMatcher('project/src/*.ts');
    expect(matcher.matches('project/src/main.ts')).toBe(true);
    expect(matcher.matches('project/lib/main.ts')).toBe(false);
  });

  it('should support single-character wildcards', () => {
    const matcher = createPathMatcher('file?.md');
    expect(matcher.matches('docs/file1.md')).toBe(true);
    expect(matcher.matches('docs/file10.md')).toBe(false);
  });

  it('should select exact mode for plain names', () => {
    const matcher = createPathMatcher('main.ts');
    expect(matcher.mode).toBe('exact');
    expect(matcher.matches('project/src/main.ts')).toBe(true);
    expect(matcher.matches('project/src/main.tsx')).toBe(false);
  });

  it('should match exact display paths', () => {
    const matcher = createPathMatcher('project/src/main.ts');
    expect(matcher.matches('project/src/main.ts')).toBe(true);
    expect(matcher.matches('other/src/main.ts')).toBe(false);
  });
});
