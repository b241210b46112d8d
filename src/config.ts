import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';
import type { ProjectConfig, QueryOptions, ServiceConfig, SourceType } from './types.js';
import { SEARCH_MODES, SOURCE_TYPES, isValidMode, isValidModel, isValidSource, listModes } from './models.js';
import { DEFAULT_MAX_FILE_SIZE } from './context/file-validator.js';
import { configError } from './errors.js';
import { DEFAULT_COMMAND_TIMEOUT_MS } from './shell/run-command.js';

dotenv.config({ path: ['.env.local', '.env'] });

export const PROJECT_CONFIG_FILE = '.ctxtermrc';
export const DEFAULT_MODE = 'pro';
export const DEFAULT_REMOTE_TIMEOUT_MS = 120_000;

export interface QueryOverrides {
  mode?: string;
  model?: string;
  sources?: string;
  stream?: boolean;
  incognito?: boolean;
}

export interface ResolvedProjectConfig {
  maxFileSize: number;
  commandTimeoutMs: number;
  ignorePatterns: string[];
  homeDir?: string;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(value: unknown, fallback: number): number {
  const parsed = typeof value === 'number' ? value : parseInt(String(value ?? ''), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toProjectConfig(raw: unknown): ProjectConfig {
  if (!isRecord(raw)) return {};
  const config: ProjectConfig = {};
  if (typeof raw.maxFileSize === 'number') config.maxFileSize = raw.maxFileSize;
  if (typeof raw.commandTimeoutMs === 'number') config.commandTimeoutMs = raw.commandTimeoutMs;
  if (typeof raw.homeDir === 'string') config.homeDir = raw.homeDir;
  if (Array.isArray(raw.ignorePatterns)) {
    config.ignorePatterns = raw.ignorePatterns.filter((p): p is string => typeof p === 'string');
  }
  return config;
}

export async function loadProjectConfig(cwd: string = process.cwd()): Promise<ResolvedProjectConfig> {
  const configPath = join(cwd, PROJECT_CONFIG_FILE);
  let config: ProjectConfig = {};

  if (existsSync(configPath)) {
    try {
      const content = await readFile(configPath, 'utf-8');
      config = toProjectConfig(JSON.parse(content));
    } catch {
      console.warn(`Warning: Could not parse ${PROJECT_CONFIG_FILE}`);
    }
  }

  return {
    maxFileSize: parsePositiveInt(config.maxFileSize, DEFAULT_MAX_FILE_SIZE),
    commandTimeoutMs: parsePositiveInt(config.commandTimeoutMs, DEFAULT_COMMAND_TIMEOUT_MS),
    ignorePatterns: config.ignorePatterns ?? [],
    homeDir: config.homeDir,
  };
}

export function parseSources(value: string): SourceType[] {
  const sources = value
    .split(',')
    .map((source) => source.trim().toLowerCase())
    .filter(Boolean);
  const invalid = sources.filter((source) => !isValidSource(source));
  if (invalid.length) {
    throw configError(`Invalid source: ${invalid.join(', ')}. Available sources: ${SOURCE_TYPES.join(', ')}`);
  }
  return sources.filter(isValidSource);
}

/**
 * Query options from CLI overrides, then CTXTERM_* variables, then defaults.
 */
export function getQueryOptions(overrides: QueryOverrides = {}): QueryOptions {
  const modeName = overrides.mode || process.env.CTXTERM_MODE || DEFAULT_MODE;
  if (!isValidMode(modeName)) {
    throw configError(`Invalid mode: ${modeName}. Available modes: ${listModes().join(', ')}`);
  }
  const modeConfig = SEARCH_MODES[modeName];

  const model = overrides.model || process.env.CTXTERM_MODEL || modeConfig.defaultModel;
  if (!isValidModel(modeName, model)) {
    throw configError(
      `Invalid model for mode "${modeName}": ${model}. Available models: ${modeConfig.models.join(', ')}`,
    );
  }

  const sources = parseSources(overrides.sources || process.env.CTXTERM_SOURCES || 'web');

  return {
    mode: modeName,
    model,
    sources: sources.length ? sources : ['web'],
    stream: overrides.stream ?? parseBoolean(process.env.CTXTERM_STREAM, false),
    incognito: overrides.incognito ?? parseBoolean(process.env.CTXTERM_INCOGNITO, true),
  };
}

export function getServiceConfig(overrides: QueryOverrides = {}): ServiceConfig {
  const baseUrl = process.env.CTXTERM_API_URL;
  if (!baseUrl) {
    throw configError('CTXTERM_API_URL not found. Set it to the base URL of the answer service.');
  }

  return {
    ...getQueryOptions(overrides),
    baseUrl,
    apiKey: process.env.CTXTERM_API_KEY || undefined,
    cookie: process.env.CTXTERM_COOKIE || undefined,
    timeoutMs: parsePositiveInt(process.env.CTXTERM_TIMEOUT_MS, DEFAULT_REMOTE_TIMEOUT_MS),
  };
}
