import { exec as execCb } from 'child_process';
import { promisify } from 'util';
import { debugLog } from '../utils/debug.js';

const execAsync = promisify(execCb);

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export type ShellResult =
  | { kind: 'completed'; stdout: string; stderr: string; exitCode: 0 }
  | { kind: 'failed'; stdout: string; stderr: string; exitCode: number }
  | { kind: 'timeout'; timeoutMs: number; stdout: string; stderr: string }
  | { kind: 'error'; message: string };

export interface RunCommandOptions {
  shell?: string;
  cwd?: string;
  timeoutMs?: number;
}

interface ExecFailure {
  message: string;
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

export function detectShell(): string {
  return process.env.SHELL || '/bin/bash';
}

/**
 * zsh and bash get their rc file sourced first so aliases and PATH tweaks
 * match the user's terminal.
 */
export function wrapForShell(command: string, shell: string): string {
  if (shell.includes('zsh')) {
    return `source ~/.zshrc 2>/dev/null; ${command}`;
  }
  if (shell.includes('bash')) {
    return `source ~/.bashrc 2>/dev/null; ${command}`;
  }
  return command;
}

export async function runShellCommand(command: string, options: RunCommandOptions = {}): Promise<ShellResult> {
  const shell = options.shell ?? detectShell();
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  debugLog('runShellCommand', shell, command);

  try {
    const { stdout, stderr } = await execAsync(wrapForShell(command, shell), {
      shell,
      cwd: options.cwd,
      timeout: timeoutMs,
      encoding: 'utf8',
    });
    return { kind: 'completed', stdout, stderr, exitCode: 0 };
  } catch (error) {
    if (!isExecFailure(error)) {
      return { kind: 'error', message: String(error) };
    }
    const stdout = error.stdout ?? '';
    const stderr = error.stderr ?? '';
    if (error.killed && error.signal) {
      return { kind: 'timeout', timeoutMs, stdout, stderr };
    }
    if (typeof error.code === 'number') {
      return { kind: 'failed', stdout, stderr, exitCode: error.code };
    }
    return { kind: 'error', message: error.message };
  }
}
