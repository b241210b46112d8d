import type { QueryOptions } from '../types.js';
import type { AnswerProvider } from '../providers/base.js';
import { ContextStore } from '../context/store.js';
import { PathBoundary } from '../fs/path-boundary.js';
import { FileSystemNavigator } from '../fs/navigator.js';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../shell/run-command.js';
import { SessionTracker } from './tracker.js';

export interface SessionOptions {
  homeDir: string;
  startDir: string;
  provider: AnswerProvider;
  queryOptions: QueryOptions;
  maxFileSize?: number;
  commandTimeoutMs?: number;
  ignorePatterns?: string[];
  shell?: string;
}

/**
 * Everything one interactive run owns: the boundary, navigation state, the
 * context store and the answer client. Built once and passed explicitly.
 */
export class Session {
  readonly boundary: PathBoundary;
  readonly navigator: FileSystemNavigator;
  readonly context: ContextStore;
  readonly provider: AnswerProvider;
  readonly tracker: SessionTracker;
  readonly commandTimeoutMs: number;
  readonly shell?: string;
  private readonly queryOptions: QueryOptions;

  private constructor(
    boundary: PathBoundary,
    navigator: FileSystemNavigator,
    context: ContextStore,
    options: SessionOptions,
  ) {
    this.boundary = boundary;
    this.navigator = navigator;
    this.context = context;
    this.provider = options.provider;
    this.queryOptions = { ...options.queryOptions };
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.shell = options.shell;
    this.tracker = new SessionTracker();
  }

  static async create(options: SessionOptions): Promise<Session> {
    const boundary = new PathBoundary(options.homeDir);
    const navigator = await FileSystemNavigator.create(boundary, options.startDir, options.ignorePatterns);
    const context = new ContextStore(boundary, navigator, { maxFileSize: options.maxFileSize });
    return new Session(boundary, navigator, context, options);
  }

  getQueryOptions(): QueryOptions {
    return { ...this.queryOptions, sources: [...this.queryOptions.sources] };
  }

  getModelName(): string {
    return `${this.queryOptions.mode}/${this.queryOptions.model}`;
  }
}
