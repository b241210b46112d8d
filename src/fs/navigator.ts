import { readdir, readFile, stat } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve } from 'path';
import { minimatch } from 'minimatch';
import type { DirectoryState } from '../context/store.js';
import { accessDenied, notFound, readFailure, wrongType, type CtxtermError } from '../errors.js';
import { formatSize } from '../utils/format.js';
import type { PathBoundary } from './path-boundary.js';

export const PARENT_TOKEN = '..';
export const PREVIOUS_TOKEN = '-';

export const DEFAULT_IGNORE_PATTERNS = ['*.pyc', '__pycache__', '.git', 'node_modules', '.env', '*.so'];
export const DEFAULT_TREE_DEPTH = 3;

export type NavResult<T> = { ok: true; value: T } | { ok: false; error: CtxtermError };

/**
 * `denied` entries live in an allowed directory but resolve outside the
 * boundary (symlinks); nothing about their target is reported.
 */
export type DirectoryEntry =
  | { name: string; kind: 'directory' | 'file'; size: number }
  | { name: string; kind: 'denied' };

export interface FileContent {
  path: string;
  content: string;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

const ok = <T>(value: T): NavResult<T> => ({ ok: true, value });
const fail = <T>(error: CtxtermError): NavResult<T> => ({ ok: false, error });

/**
 * Current/previous directory state confined to the boundary root. Every
 * operation checks the boundary before touching the filesystem.
 */
export class FileSystemNavigator implements DirectoryState {
  readonly homeDir: string;
  private currentDir: string;
  private previousDir: string;
  private readonly boundary: PathBoundary;
  private readonly ignorePatterns: string[];

  constructor(boundary: PathBoundary, homeDir: string, startDir: string, ignorePatterns: string[] = []) {
    this.boundary = boundary;
    this.homeDir = homeDir;
    this.currentDir = startDir;
    this.previousDir = startDir;
    this.ignorePatterns = [...DEFAULT_IGNORE_PATTERNS, ...ignorePatterns];
  }

  /**
   * Navigator rooted at the canonical boundary root, starting in `startDir`
   * when it lies inside the boundary and at the root otherwise.
   */
  static async create(
    boundary: PathBoundary,
    startDir: string,
    ignorePatterns: string[] = [],
  ): Promise<FileSystemNavigator> {
    const home = await boundary.getCanonicalRoot();
    const start = await boundary.canonicalize(startDir);
    const initial = start !== null && (await boundary.isAllowed(start)) ? start : home;
    return new FileSystemNavigator(boundary, home, initial, ignorePatterns);
  }

  getCurrentDir(): string {
    return this.currentDir;
  }

  getPreviousDir(): string {
    return this.previousDir;
  }

  resolvePath(input?: string): string {
    if (!input) return this.currentDir;
    return isAbsolute(input) ? resolve(input) : resolve(this.currentDir, input);
  }

  async changeDirectory(target?: string): Promise<NavResult<string>> {
    let destination: string;
    if (target === undefined || target === '') {
      destination = this.homeDir;
    } else if (target === PARENT_TOKEN) {
      destination = dirname(this.currentDir);
    } else if (target === PREVIOUS_TOKEN) {
      destination = this.previousDir;
    } else {
      destination = this.resolvePath(target);
    }

    const canonical = await this.boundary.canonicalize(destination);
    if (canonical === null || !(await this.boundary.isAllowed(canonical))) {
      return fail(accessDenied(destination));
    }

    try {
      const info = await stat(canonical);
      if (!info.isDirectory()) {
        return fail(wrongType(canonical, 'directory'));
      }
    } catch {
      return fail(notFound(canonical, 'Directory'));
    }

    this.previousDir = this.currentDir;
    this.currentDir = canonical;
    return ok(canonical);
  }

  async listDirectory(path?: string): Promise<NavResult<DirectoryEntry[]>> {
    const target = this.resolvePath(path);
    if (!(await this.boundary.isAllowed(target))) {
      return fail(accessDenied(target));
    }

    let names: string[];
    try {
      const info = await stat(target);
      if (!info.isDirectory()) {
        return fail(wrongType(target, 'directory'));
      }
      names = await readdir(target);
    } catch (error) {
      return fail(this.describeFailure(target, error));
    }

    const entries = await Promise.all(names.map((name) => this.describeEntry(join(target, name), name)));
    return ok(entries.filter((entry): entry is DirectoryEntry => entry !== null).sort(compareEntries));
  }

  async readFile(path: string): Promise<NavResult<FileContent>> {
    const target = this.resolvePath(path);
    if (!(await this.boundary.isAllowed(target))) {
      return fail(accessDenied(target));
    }

    try {
      const info = await stat(target);
      if (!info.isFile()) {
        return fail(wrongType(path, 'file'));
      }
    } catch {
      return fail(notFound(path, 'File'));
    }

    try {
      const content = utf8.decode(await readFile(target));
      return ok({ path: target, content });
    } catch (error) {
      return fail(readFailure(path, error instanceof TypeError ? new Error('binary file or encoding error') : error));
    }
  }

  /**
   * Box-drawing tree of `path`, directories first, ignore patterns applied.
   */
  async tree(path?: string, maxDepth = DEFAULT_TREE_DEPTH): Promise<NavResult<string[]>> {
    const target = this.resolvePath(path);
    if (!(await this.boundary.isAllowed(target))) {
      return fail(accessDenied(target));
    }
    try {
      await stat(target);
    } catch {
      return fail(notFound(target));
    }

    const lines = [`${basename(target) || target}/`];
    await this.walkTree(target, maxDepth, 0, '', lines);
    return ok(lines);
  }

  relativeToHome(): string {
    const rel = relative(this.homeDir, this.currentDir);
    if (rel === '') return '~';
    if (rel === '..' || rel.startsWith('../') || isAbsolute(rel)) return this.currentDir;
    return `~/${rel}`;
  }

  private async walkTree(
    dir: string,
    maxDepth: number,
    depth: number,
    prefix: string,
    lines: string[],
  ): Promise<void> {
    if (depth >= maxDepth) return;

    let names: string[];
    try {
      const info = await stat(dir);
      if (!info.isDirectory()) return;
      names = await readdir(dir);
    } catch {
      lines.push(`${prefix}Permission denied`);
      return;
    }

    const entries = (await Promise.all(names.map((name) => this.describeEntry(join(dir, name), name))))
      .filter((entry): entry is DirectoryEntry => entry !== null)
      .filter((entry) => !this.isIgnored(entry.name))
      .sort(compareEntriesCaseInsensitive);

    for (const [index, entry] of entries.entries()) {
      const isLast = index === entries.length - 1;
      const branch = isLast ? '└── ' : '├── ';
      const childPrefix = prefix + (isLast ? '    ' : '│   ');
      switch (entry.kind) {
        case 'denied':
          lines.push(`${prefix}${branch}${entry.name} (access denied)`);
          break;
        case 'directory':
          lines.push(`${prefix}${branch}${entry.name}/`);
          await this.walkTree(join(dir, entry.name), maxDepth, depth + 1, childPrefix, lines);
          break;
        case 'file':
          lines.push(`${prefix}${branch}${entry.name} (${formatSize(entry.size)})`);
          break;
      }
    }
  }

  private isIgnored(name: string): boolean {
    return this.ignorePatterns.some((pattern) => minimatch(name, pattern, { dot: true }));
  }

  private async describeEntry(path: string, name: string): Promise<DirectoryEntry | null> {
    if (!(await this.boundary.isAllowed(path))) {
      return { name, kind: 'denied' };
    }
    try {
      const info = await stat(path);
      return { name, kind: info.isDirectory() ? 'directory' : 'file', size: info.size };
    } catch {
      return null;
    }
  }

  private describeFailure(path: string, error: unknown): CtxtermError {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return notFound(path);
    }
    return readFailure(path, error);
  }
}

function directoriesFirst(a: DirectoryEntry, b: DirectoryEntry): number {
  const aDir = a.kind === 'directory';
  const bDir = b.kind === 'directory';
  return aDir === bDir ? 0 : aDir ? -1 : 1;
}

function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  const byKind = directoriesFirst(a, b);
  if (byKind !== 0) return byKind;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function compareEntriesCaseInsensitive(a: DirectoryEntry, b: DirectoryEntry): number {
  const byKind = directoriesFirst(a, b);
  if (byKind !== 0) return byKind;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}
