import { readdir, stat } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { glob } from 'glob';
import type { FileReference, PasteEntry } from '../types.js';
import type { PathBoundary } from '../fs/path-boundary.js';
import { composeQuery, type ComposedQuery } from '../query/composer.js';
import { countLines, formatTimeAgo } from '../utils/format.js';
import { debugLog } from '../utils/debug.js';
import { DEFAULT_MAX_FILE_SIZE, isBinaryFile, isTooLarge } from './file-validator.js';
import { createPathMatcher, hasWildcard } from './path-matcher.js';

export const WILDCARD_ALL = '*';
export const PASTE_ID_PATTERN = /^paste_\d+$/;

/**
 * Read-only view of the navigator that the store resolves patterns against.
 */
export interface DirectoryState {
  readonly homeDir: string;
  getCurrentDir(): string;
}

export type SkipReason = 'not-a-file' | 'access-denied' | 'too-large' | 'binary';

export interface SkippedCandidate {
  path: string;
  reason: SkipReason;
  byteSize?: number;
}

export interface AddFilesResult {
  added: number;
  candidates: number;
  notFound: boolean;
  addedFiles: FileReference[];
  skipped: SkippedCandidate[];
}

export interface ListedFile {
  displayPath: string;
  name: string;
  /** Live size, or null when the file has gone missing since it was added. */
  byteSize: number | null;
}

export interface FileGroup {
  folder: string;
  files: ListedFile[];
}

export interface ListedPaste {
  id: string;
  lineCount: number;
  byteSize: number;
  age: string;
}

export interface ContextListing {
  totalItems: number;
  totalBytes: number;
  fileGroups: FileGroup[];
  pastes: ListedPaste[];
}

export interface ContextStoreOptions {
  maxFileSize?: number;
  now?: () => Date;
}

type Expansion =
  | { kind: 'candidates'; candidates: string[]; notFound: boolean }
  | { kind: 'denied'; path: string };

/**
 * Leading path segments of a glob before the first one holding a wildcard,
 * i.e. the directory the glob starts reading from.
 */
export function globBase(pattern: string): string {
  const segments = pattern.split('/');
  const firstMagic = segments.findIndex(hasWildcard);
  const base = segments.slice(0, firstMagic === -1 ? segments.length : firstMagic).join('/');
  if (base === '') {
    return pattern.startsWith('/') ? '/' : '.';
  }
  return base;
}

export function formatPasteId(sequence: number): string {
  return `paste_${String(sequence).padStart(3, '0')}`;
}

/**
 * Session registry of context items. Files are keyed by canonical absolute
 * path (re-adding overwrites), pastes by a monotonically increasing id that
 * is never reused.
 */
export class ContextStore {
  private readonly files = new Map<string, FileReference>();
  private readonly pastes = new Map<string, PasteEntry>();
  private pasteSequence = 0;
  private readonly boundary: PathBoundary;
  private readonly directory: DirectoryState;
  private readonly maxFileSize: number;
  private readonly now: () => Date;

  constructor(boundary: PathBoundary, directory: DirectoryState, options: ContextStoreOptions = {}) {
    this.boundary = boundary;
    this.directory = directory;
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  getFiles(): FileReference[] {
    return Array.from(this.files.values());
  }

  getPastes(): PasteEntry[] {
    return Array.from(this.pastes.values());
  }

  get fileCount(): number {
    return this.files.size;
  }

  get pasteCount(): number {
    return this.pastes.size;
  }

  isEmpty(): boolean {
    return this.files.size === 0 && this.pastes.size === 0;
  }

  async addFiles(pattern: string): Promise<AddFilesResult> {
    const expansion = await this.expandPattern(pattern);
    const result: AddFilesResult = {
      added: 0,
      candidates: 0,
      notFound: false,
      addedFiles: [],
      skipped: [],
    };

    if (expansion.kind === 'denied') {
      result.candidates = 1;
      result.skipped.push({ path: expansion.path, reason: 'access-denied' });
      return result;
    }

    result.candidates = expansion.candidates.length;
    result.notFound = expansion.notFound;
    for (const candidate of expansion.candidates) {
      const reference = await this.validateCandidate(candidate, result.skipped);
      if (!reference) continue;
      this.files.set(reference.absolutePath, reference);
      result.addedFiles.push(reference);
      result.added += 1;
    }

    debugLog('ContextStore.addFiles', pattern, 'added', result.added, 'skipped', result.skipped.length);
    return result;
  }

  addPaste(content: string): string {
    this.pasteSequence += 1;
    const id = formatPasteId(this.pasteSequence);
    this.pastes.set(id, {
      kind: 'paste',
      id,
      content,
      createdAt: this.now(),
      lineCount: countLines(content),
      byteSize: Buffer.byteLength(content, 'utf8'),
    });
    return id;
  }

  removeFiles(pattern: string): number {
    if (pattern === WILDCARD_ALL) {
      const removed = this.files.size;
      this.files.clear();
      return removed;
    }

    const matcher = createPathMatcher(pattern);
    let removed = 0;
    for (const [key, reference] of Array.from(this.files.entries())) {
      if (matcher.matches(reference.displayPath)) {
        this.files.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  removePaste(id: string): boolean {
    return this.pastes.delete(id);
  }

  clearAll(): { filesRemoved: number; pastesRemoved: number } {
    const cleared = { filesRemoved: this.files.size, pastesRemoved: this.pastes.size };
    this.files.clear();
    this.pastes.clear();
    return cleared;
  }

  async list(): Promise<ContextListing> {
    let totalBytes = 0;
    const groups = new Map<string, ListedFile[]>();

    for (const reference of this.files.values()) {
      const byteSize = await this.liveSize(reference.absolutePath);
      if (byteSize !== null) totalBytes += byteSize;
      const folder = dirname(reference.displayPath);
      const group = groups.get(folder) ?? [];
      group.push({ displayPath: reference.displayPath, name: basename(reference.displayPath), byteSize });
      groups.set(folder, group);
    }

    const now = this.now();
    const pastes: ListedPaste[] = this.getPastes().map((paste) => {
      totalBytes += paste.byteSize;
      return {
        id: paste.id,
        lineCount: paste.lineCount,
        byteSize: paste.byteSize,
        age: formatTimeAgo(paste.createdAt, now),
      };
    });

    const fileGroups = Array.from(groups.entries())
      .sort(([a], [b]) => {
        if (a === '.') return -1;
        if (b === '.') return 1;
        return a.localeCompare(b);
      })
      .map(([folder, files]) => ({ folder, files }));

    return {
      totalItems: this.files.size + this.pastes.size,
      totalBytes,
      fileGroups,
      pastes,
    };
  }

  composeForQuery(question: string): Promise<ComposedQuery> {
    return composeQuery(this, question);
  }

  /**
   * The boundary is checked on the directory a pattern reads from before it
   * is touched, so paths outside home behave the same whether or not they
   * exist.
   */
  private async expandPattern(pattern: string): Promise<Expansion> {
    const cwd = this.directory.getCurrentDir();

    if (hasWildcard(pattern)) {
      const base = resolve(cwd, globBase(pattern));
      if (!(await this.boundary.isAllowed(base))) {
        return { kind: 'denied', path: base };
      }
      const matches = await glob(pattern, { cwd, absolute: true, dot: false });
      return { kind: 'candidates', candidates: matches.sort(), notFound: matches.length === 0 };
    }

    const target = resolve(cwd, pattern);
    if (!(await this.boundary.isAllowed(target))) {
      return { kind: 'denied', path: target };
    }
    try {
      const info = await stat(target);
      if (info.isDirectory()) {
        const children = await readdir(target);
        return { kind: 'candidates', candidates: children.sort().map((child) => join(target, child)), notFound: false };
      }
      return { kind: 'candidates', candidates: [target], notFound: false };
    } catch (error) {
      debugLog('ContextStore: cannot stat', target, error);
      return { kind: 'candidates', candidates: [], notFound: true };
    }
  }

  private async validateCandidate(
    candidate: string,
    skipped: SkippedCandidate[],
  ): Promise<FileReference | null> {
    const canonical = await this.boundary.canonicalize(candidate);
    if (canonical === null || !(await this.boundary.isAllowed(canonical))) {
      skipped.push({ path: candidate, reason: 'access-denied' });
      return null;
    }

    let byteSize: number;
    try {
      const info = await stat(canonical);
      if (!info.isFile()) {
        skipped.push({ path: candidate, reason: 'not-a-file' });
        return null;
      }
      byteSize = info.size;
    } catch {
      skipped.push({ path: candidate, reason: 'not-a-file' });
      return null;
    }

    if (isTooLarge(byteSize, this.maxFileSize)) {
      skipped.push({ path: candidate, reason: 'too-large', byteSize });
      return null;
    }

    if (await isBinaryFile(canonical)) {
      skipped.push({ path: candidate, reason: 'binary', byteSize });
      return null;
    }

    const displayPath = (await this.boundary.relativeToRoot(canonical)) ?? canonical;
    return { kind: 'file', absolutePath: canonical, displayPath, byteSize };
  }

  private async liveSize(path: string): Promise<number | null> {
    try {
      return (await stat(path)).size;
    } catch {
      return null;
    }
  }
}
