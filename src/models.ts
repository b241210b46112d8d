import type { SearchMode, SourceType } from './types.js';

export interface ModeConfig {
  name: SearchMode;
  description: string;
  models: string[];
  defaultModel: string;
}

export const SEARCH_MODES: Record<SearchMode, ModeConfig> = {
  auto: {
    name: 'auto',
    description: 'Fast answers with the service default model',
    models: ['turbo'],
    defaultModel: 'turbo',
  },
  pro: {
    name: 'pro',
    description: 'Multi-step search with a selectable model',
    models: ['sonar', 'gpt-5.1', 'gpt-4.5', 'claude-4.5-sonnet', 'gemini-2.5-pro', 'grok-4'],
    defaultModel: 'gpt-5.1',
  },
  reasoning: {
    name: 'reasoning',
    description: 'Search with an explicit reasoning pass',
    models: ['gpt-5.1-thinking', 'claude-4.5-sonnet-thinking', 'kimi-k2-thinking', 'grok-4'],
    defaultModel: 'gpt-5.1-thinking',
  },
  'deep research': {
    name: 'deep research',
    description: 'Long-running research report',
    models: ['research'],
    defaultModel: 'research',
  },
};

export const SOURCE_TYPES: readonly SourceType[] = ['web', 'scholar', 'social'];

export function isValidMode(mode: string): mode is SearchMode {
  return Object.prototype.hasOwnProperty.call(SEARCH_MODES, mode);
}

export function isValidModel(mode: SearchMode, model: string): boolean {
  return SEARCH_MODES[mode].models.includes(model);
}

export function isValidSource(source: string): source is SourceType {
  return SOURCE_TYPES.some((known) => known === source);
}

export function listModes(): SearchMode[] {
  return Object.values(SEARCH_MODES).map((mode) => mode.name);
}

export function getModeConfig(mode: string): ModeConfig | null {
  return isValidMode(mode) ? SEARCH_MODES[mode] : null;
}
