export type SearchMode = 'auto' | 'pro' | 'reasoning' | 'deep research';
export type SourceType = 'web' | 'scholar' | 'social';

export interface QueryOptions {
  mode: SearchMode;
  model: string;
  sources: SourceType[];
  stream: boolean;
  incognito: boolean;
}

export interface ServiceConfig extends QueryOptions {
  baseUrl: string;
  apiKey?: string;
  cookie?: string;
  timeoutMs: number;
}

export interface ProjectConfig {
  maxFileSize?: number;
  commandTimeoutMs?: number;
  ignorePatterns?: string[];
  homeDir?: string;
}

export interface FileReference {
  kind: 'file';
  absolutePath: string;
  displayPath: string;
  byteSize: number;
}

export interface PasteEntry {
  kind: 'paste';
  id: string;
  content: string;
  createdAt: Date;
  lineCount: number;
  byteSize: number;
}

/**
 * One unit of a multi-stage answer (search results, final answer, ...).
 */
export interface Step {
  step_type?: string;
  content?: unknown;
  [key: string]: unknown;
}

export interface SearchResponse {
  text?: unknown;
  [key: string]: unknown;
}

export interface SearchChunk {
  text?: unknown;
  [key: string]: unknown;
}
