import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { handlePaste } from '../../src/commands/paste-handler.js';
import { classifyPaste, type PasteStats } from '../../src/context/paste-classifier.js';
import type { Session } from '../../src/session/state.js';
import { createSandbox, createTestSession, loggedLines, type Sandbox } from '../helpers/session.js';

const prompt = vi.hoisted(() => vi.fn());

vi.mock('inquirer', () => ({
  default: { prompt },
}));

const PASTE = 'line 1\nline 2\nline 3\nline 4\nline 5';

function statsOf(text: string): PasteStats {
  const classification = classifyPaste(text);
  if (!classification.isPaste) {
    throw new Error('expected a paste');
  }
  return classification.stats;
}

describe('handlePaste', () => {
  let sandbox: Sandbox;
  let session: Session;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    prompt.mockReset();
    sandbox = await createSandbox('ctxterm-paste-');
    ({ session } = await createTestSession(sandbox.home));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    log.mockRestore();
    await sandbox.cleanup();
  });

  it('should show statistics and a preview before asking', async () => {
    prompt.mockResolvedValue({ action: 'discard' });

    await handlePaste(PASTE, statsOf(PASTE), session);

    expect(loggedLines(log).slice(0, 3)).toEqual([
      '\n📋 Detected large text paste (5 lines, 34.0B)',
      'Preview:',
      '  line 1\n  line 2\n  line 3\n  ... (2 more lines)',
    ]);
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('should add the paste to the context', async () => {
    prompt.mockResolvedValue({ action: 'add' });

    expect(await handlePaste(PASTE, statsOf(PASTE), session)).toBe('add');

    expect(session.context.getPastes().map((paste) => paste.content)).toEqual([PASTE]);
    expect(loggedLines(log)).toContain('✓ Added as paste_001 to context');
  });

  it('should leave the context alone when sending directly', async () => {
    prompt.mockResolvedValue({ action: 'send' });

    expect(await handlePaste(PASTE, statsOf(PASTE), session)).toBe('send');
    expect(session.context.pasteCount).toBe(0);
  });

  it('should discard the paste', async () => {
    prompt.mockResolvedValue({ action: 'discard' });

    expect(await handlePaste(PASTE, statsOf(PASTE), session)).toBe('discard');
    expect(session.context.pasteCount).toBe(0);
    expect(loggedLines(log)).toContain('Discarded');
  });
});
