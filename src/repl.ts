import readline from 'readline';
import chalk from 'chalk';
import type { Session } from './session/state.js';
import { classifyPaste, type PasteStats } from './context/paste-classifier.js';
import { handleFsCommand, isFsCommand } from './commands/fs-commands.js';
import { handleContextCommand } from './commands/context-commands.js';
import { handleAiQuery, type QueryOutcome } from './commands/ai-query.js';
import { handlePaste, type PasteAction } from './commands/paste-handler.js';
import { SHELL_PREFIX, handleSystemCommand } from './commands/system-command.js';
import { printError, printFooter, printHeader } from './ui/output.js';
import { errorMessage } from './errors.js';
import { debugError, debugLog } from './utils/debug.js';

// Lines arriving closer together than this are treated as one pasted block.
export const MULTILINE_INPUT_FLUSH_DELAY_MS = 30;

const HELP_LINES = [
  ['ls [path]', 'list directory contents'],
  ['cd [path|..|-]', 'change directory (no argument: home)'],
  ['pwd', 'print working directory'],
  ['cat <file>', 'show a file'],
  ['tree [path]', 'show directory tree'],
  ['@add <pattern>', 'add files to context (glob, file or directory)'],
  ['@remove <pattern|paste_NNN>', 'remove files or a paste from context'],
  ['@list, @ls', 'show context items'],
  ['@clear', 'remove every context item'],
  ['!<command>', 'run a shell command'],
  ['exit', 'leave'],
];

export class REPL {
  private readonly session: Session;
  private rl: readline.Interface | null = null;
  private bufferedLines: string[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private queue: Promise<void> = Promise.resolve();
  private activeQuery: AbortController | null = null;
  private closed = false;

  constructor(session: Session) {
    this.session = session;
  }

  async start(): Promise<void> {
    printHeader();
    console.log(chalk.gray('Type "help" for commands. Anything else is sent as a question.\n'));

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: this.promptText(),
    });
    this.rl = rl;

    return new Promise<void>((resolve) => {
      rl.on('line', (line: string) => {
        this.enqueueLine(line);
      });

      rl.on('close', () => {
        debugLog('Readline closed');
        this.closed = true;
        this.activeQuery?.abort();
        console.log('\n' + this.session.tracker.buildSummary(this.session.getModelName()));
        printFooter();
        resolve();
      });

      rl.on('SIGINT', () => {
        if (this.activeQuery) {
          debugLog('SIGINT: cancelling active query');
          this.activeQuery.abort();
          return;
        }
        console.log('');
        rl.close();
      });

      rl.prompt();
    });
  }

  private promptText(): string {
    return `${chalk.gray(this.session.navigator.relativeToHome())} ${chalk.green.bold('>')} `;
  }

  private reprompt(): void {
    if (!this.rl || this.closed) return;
    this.rl.setPrompt(this.promptText());
    this.rl.prompt();
  }

  private enqueueLine(line: string): void {
    this.bufferedLines.push(line);
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
    }
    this.flushTimer = setTimeout(() => this.flushLines(), MULTILINE_INPUT_FLUSH_DELAY_MS);
  }

  private flushLines(): void {
    this.flushTimer = null;
    if (!this.bufferedLines.length) return;
    const block = this.bufferedLines.join('\n');
    this.bufferedLines = [];

    this.queue = this.queue.then(async () => {
      try {
        await this.handleInput(block);
      } catch (error) {
        debugError('Error in handleInput:', error);
        printError(`Input handling error: ${errorMessage(error)}`);
      } finally {
        this.reprompt();
      }
    });
  }

  private async handleInput(input: string): Promise<void> {
    const trimmed = input.trim();
    if (!trimmed) {
      return;
    }

    const classification = classifyPaste(trimmed);
    if (classification.isPaste) {
      const action = await this.promptPaste(trimmed, classification.stats);
      this.session.tracker.recordCommand(`paste:${action}`);
      if (action === 'send') {
        await this.runQuery(trimmed);
      }
      return;
    }

    const [command, ...args] = trimmed.split(/\s+/);
    const lower = command.toLowerCase();

    if (lower === 'exit' || lower === 'quit') {
      this.rl?.close();
      return;
    }

    if (lower === 'help') {
      this.showHelp();
      return;
    }

    if (isFsCommand(lower)) {
      this.session.tracker.recordCommand(lower);
      await handleFsCommand(lower, args, this.session);
      return;
    }

    if (lower.startsWith('@')) {
      this.session.tracker.recordCommand(lower);
      await handleContextCommand(lower, args, this.session);
      return;
    }

    if (trimmed.startsWith(SHELL_PREFIX)) {
      const shellCommand = trimmed.slice(SHELL_PREFIX.length).trim();
      if (shellCommand) {
        this.session.tracker.recordCommand('shell');
        await handleSystemCommand(shellCommand, this.session);
      }
      return;
    }

    await this.runQuery(trimmed);
  }

  private async promptPaste(text: string, stats: PasteStats): Promise<PasteAction> {
    // inquirer needs the terminal to itself
    this.rl?.pause();
    try {
      return await handlePaste(text, stats, this.session);
    } finally {
      this.rl?.resume();
    }
  }

  private async runQuery(question: string): Promise<QueryOutcome> {
    const controller = new AbortController();
    this.activeQuery = controller;
    try {
      return await handleAiQuery(question, this.session, { signal: controller.signal });
    } finally {
      this.activeQuery = null;
    }
  }

  private showHelp(): void {
    console.log(chalk.cyan('\nCommands:'));
    for (const [name, description] of HELP_LINES) {
      console.log(chalk.green(`  ${name.padEnd(30)}`) + chalk.gray(description));
    }
    console.log('');
  }
}
