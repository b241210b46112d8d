import chalk from 'chalk';
import { extname } from 'path';
import type { Session } from '../session/state.js';
import { formatSize } from '../utils/format.js';
import { printError, printSuccess } from '../ui/output.js';

export const FS_COMMANDS = ['ls', 'cd', 'pwd', 'cat', 'tree'] as const;
export type FsCommand = (typeof FS_COMMANDS)[number];

const CODE_EXTENSIONS = new Set([
  '.ts', '.tsx', '.js', '.jsx', '.py', '.java', '.cpp', '.c', '.h', '.css', '.html',
  '.json', '.xml', '.yaml', '.yml', '.md', '.sql', '.sh', '.go', '.rs',
]);

export function isFsCommand(command: string): command is FsCommand {
  return FS_COMMANDS.some((known) => known === command);
}

function numbered(content: string): string {
  const lines = content.split('\n');
  const width = String(lines.length).length;
  return lines.map((line, index) => `${chalk.gray(String(index + 1).padStart(width))}  ${line}`).join('\n');
}

export async function handleFsCommand(command: FsCommand, args: string[], session: Session): Promise<void> {
  const { navigator } = session;
  const target = args[0];

  switch (command) {
    case 'ls': {
      const result = await navigator.listDirectory(target);
      if (!result.ok) {
        printError(result.error.message);
        return;
      }
      for (const entry of result.value) {
        if (entry.kind === 'directory') {
          console.log(chalk.blue.bold(`📁 ${entry.name}/`));
        } else if (entry.kind === 'denied') {
          console.log(`🔒 ${entry.name} ${chalk.red('(access denied)')}`);
        } else {
          console.log(`📄 ${entry.name} ${chalk.gray(`(${formatSize(entry.size)})`)}`);
        }
      }
      return;
    }
    case 'cd': {
      const result = await navigator.changeDirectory(target);
      if (!result.ok) {
        printError(result.error.message);
        return;
      }
      printSuccess(chalk.gray(result.value));
      return;
    }
    case 'pwd':
      console.log(chalk.cyan(navigator.getCurrentDir()));
      return;
    case 'cat': {
      if (!target) {
        printError('Usage: cat <filename>');
        return;
      }
      const result = await navigator.readFile(target);
      if (!result.ok) {
        printError(result.error.message);
        return;
      }
      const { content } = result.value;
      console.log(chalk.cyan(`── ${target} ──`));
      console.log(CODE_EXTENSIONS.has(extname(target).toLowerCase()) ? numbered(content) : content);
      return;
    }
    case 'tree': {
      const result = await navigator.tree(target);
      if (!result.ok) {
        printError(result.error.message);
        return;
      }
      const [root, ...rest] = result.value;
      console.log(chalk.cyan.bold(root));
      rest.forEach((line) => console.log(line));
      return;
    }
  }
}
