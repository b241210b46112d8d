import chalk from 'chalk';
import type { Session } from '../session/state.js';
import { runShellCommand, type ShellResult } from '../shell/run-command.js';
import { printError, printWarning } from '../ui/output.js';

export const SHELL_PREFIX = '!';

function printStreams(stdout: string, stderr: string, succeeded: boolean): void {
  if (stdout) {
    process.stdout.write(stdout);
  }
  if (stderr) {
    process.stdout.write(succeeded ? chalk.yellow(stderr) : chalk.red(stderr));
  }
}

/**
 * Runs `command` through the user's shell inside the current directory.
 */
export async function handleSystemCommand(command: string, session: Session): Promise<ShellResult> {
  console.log(chalk.gray(`$ ${command}`));
  const result = await runShellCommand(command, {
    cwd: session.navigator.getCurrentDir(),
    timeoutMs: session.commandTimeoutMs,
    shell: session.shell,
  });

  switch (result.kind) {
    case 'completed':
      printStreams(result.stdout, result.stderr, true);
      break;
    case 'failed':
      printStreams(result.stdout, result.stderr, false);
      printWarning(`Exit code: ${result.exitCode}`);
      break;
    case 'timeout':
      printStreams(result.stdout, result.stderr, false);
      printError(`Command timeout (${Math.round(result.timeoutMs / 1000)}s limit)`);
      break;
    case 'error':
      printError(`Error: ${result.message}`);
      break;
  }
  return result;
}
