import { vi, type Mock } from 'vitest';
import { mkdir, mkdtemp, realpath, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { AnswerProvider } from '../../src/providers/base.js';
import type { QueryOptions } from '../../src/types.js';
import { Session, type SessionOptions } from '../../src/session/state.js';

export const TEST_QUERY_OPTIONS: QueryOptions = {
  mode: 'pro',
  model: 'gpt-5.1',
  sources: ['web'],
  stream: false,
  incognito: true,
};

export interface Sandbox {
  home: string;
  outside: string;
  cleanup(): Promise<void>;
}

/**
 * Temporary `home` and `outside` directories under one canonical root.
 */
export async function createSandbox(prefix: string): Promise<Sandbox> {
  const root = await realpath(await mkdtemp(join(tmpdir(), prefix)));
  const home = join(root, 'home');
  const outside = join(root, 'outside');
  await mkdir(home, { recursive: true });
  await mkdir(outside, { recursive: true });
  return { home, outside, cleanup: () => rm(root, { recursive: true, force: true }) };
}

export interface TestSession {
  session: Session;
  search: Mock<AnswerProvider['search']>;
}

export async function createTestSession(
  home: string,
  overrides: Partial<Omit<SessionOptions, 'provider'>> = {},
): Promise<TestSession> {
  const search = vi.fn<AnswerProvider['search']>();
  const session = await Session.create({
    homeDir: home,
    startDir: home,
    queryOptions: TEST_QUERY_OPTIONS,
    shell: '/bin/sh',
    ...overrides,
    provider: { search },
  });
  return { session, search };
}

/**
 * Every call of a console spy, arguments joined by a space.
 */
export function loggedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => args.map(String).join(' '));
}
