import { lstat, realpath } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { debugLog } from '../utils/debug.js';

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Security boundary for every filesystem access: a path is allowed only when
 * its canonical form (symlinks followed, `..` removed) is the root itself or
 * lies below it. Resolution failures deny.
 */
export class PathBoundary {
  readonly root: string;
  private canonicalRoot: Promise<string> | null = null;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Canonical absolute path of `target`, or null when it cannot be resolved.
   * A missing final component resolves against its canonical parent so that
   * not-yet-existing names report NotFound rather than AccessDenied; a
   * dangling symlink or any other missing component fails.
   */
  async canonicalize(target: string): Promise<string | null> {
    const absolute = resolve(target);
    try {
      return await realpath(absolute);
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) {
        debugLog('PathBoundary: cannot resolve', absolute, error);
        return null;
      }
    }
    if (await this.exists(absolute)) {
      debugLog('PathBoundary: dangling symlink', absolute);
      return null;
    }
    try {
      const parent = await realpath(dirname(absolute));
      return join(parent, basename(absolute));
    } catch (error) {
      debugLog('PathBoundary: cannot resolve parent of', absolute, error);
      return null;
    }
  }

  async isAllowed(target: string): Promise<boolean> {
    const canonical = await this.canonicalize(target);
    if (canonical === null) {
      return false;
    }
    return this.contains(await this.getCanonicalRoot(), canonical);
  }

  /**
   * Path relative to the canonical root, or null when outside of it.
   */
  async relativeToRoot(canonicalPath: string): Promise<string | null> {
    const root = await this.getCanonicalRoot();
    if (!this.contains(root, canonicalPath)) {
      return null;
    }
    return relative(root, canonicalPath);
  }

  getCanonicalRoot(): Promise<string> {
    if (!this.canonicalRoot) {
      this.canonicalRoot = realpath(this.root).catch(() => this.root);
    }
    return this.canonicalRoot;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await lstat(path);
      return true;
    } catch {
      return false;
    }
  }

  private contains(root: string, candidate: string): boolean {
    const rel = relative(root, candidate);
    if (rel === '') return true;
    if (isAbsolute(rel)) return false;
    return rel !== '..' && !rel.startsWith(`..${sep}`);
  }
}
