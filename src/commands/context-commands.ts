import chalk from 'chalk';
import { basename } from 'path';
import type { Session } from '../session/state.js';
import { PASTE_ID_PATTERN, type AddFilesResult, type ContextListing } from '../context/store.js';
import { formatSize } from '../utils/format.js';
import { printDim, printSuccess, printWarning } from '../ui/output.js';

export const CONTEXT_COMMANDS = ['@add', '@remove', '@list', '@ls', '@clear'] as const;

function reportAdd(pattern: string, result: AddFilesResult): void {
  for (const skipped of result.skipped) {
    if (skipped.reason === 'too-large') {
      printWarning(`Skipped (too large): ${basename(skipped.path)}`);
    } else if (skipped.reason === 'binary') {
      printWarning(`Skipped (binary): ${basename(skipped.path)}`);
    }
  }

  const denied = result.skipped.filter((skipped) => skipped.reason === 'access-denied').length;
  if (denied > 0) {
    printWarning(`Access denied: ${denied} path(s) outside home directory`);
  }

  if (result.added > 0) {
    printSuccess(`Added ${result.added} file(s) to context`);
    const folders = Array.from(
      new Set(
        result.addedFiles
          .map((file) => file.displayPath.split('/').slice(0, -1).join('/'))
          .filter(Boolean),
      ),
    ).sort();
    if (folders.length) {
      printDim(`Folders: ${folders.join(', ')}`);
    }
    return;
  }

  if (result.notFound) {
    printWarning(`No files matched: ${pattern}`);
  }
  printWarning('No files added');
}

export function renderListing(listing: ContextListing): string[] {
  if (listing.totalItems === 0) {
    return [chalk.gray('No items in context')];
  }

  const lines = [
    chalk.cyan.bold(`📋 Context (${listing.totalItems} item(s), ${formatSize(listing.totalBytes)})`),
  ];

  for (const group of listing.fileGroups) {
    if (group.folder !== '.') {
      lines.push(chalk.gray(`\n${group.folder}/`));
    }
    for (const file of group.files) {
      const size = file.byteSize === null ? chalk.red('missing') : chalk.gray(`(${formatSize(file.byteSize)})`);
      lines.push(`  • ${file.name} ${size}`);
    }
  }

  if (listing.pastes.length) {
    lines.push(chalk.gray('\nPastes:'));
    for (const paste of listing.pastes) {
      lines.push(
        `  • ${paste.id} ${chalk.gray(`(${paste.lineCount} lines, ${formatSize(paste.byteSize)}, ${paste.age})`)}`,
      );
    }
  }

  return lines;
}

/**
 * `@`-prefixed commands operating on the context store.
 */
export async function handleContextCommand(command: string, args: string[], session: Session): Promise<void> {
  const store = session.context;
  const pattern = args.join(' ').trim();

  switch (command) {
    case '@add': {
      if (!pattern) {
        printWarning('Usage: @add <pattern>');
        printDim('Example: @add *.ts');
        return;
      }
      reportAdd(pattern, await store.addFiles(pattern));
      return;
    }
    case '@remove': {
      if (!pattern) {
        printWarning('Usage: @remove <pattern>');
        printDim('Example: @remove *.ts or @remove paste_001');
        return;
      }
      if (PASTE_ID_PATTERN.test(pattern)) {
        if (store.removePaste(pattern)) {
          printSuccess(`Removed ${pattern} from context`);
        } else {
          printWarning(`Paste not found: ${pattern}`);
        }
        return;
      }
      const removed = store.removeFiles(pattern);
      printSuccess(`Removed ${removed} file(s) from context`);
      return;
    }
    case '@list':
    case '@ls': {
      renderListing(await store.list()).forEach((line) => console.log(line));
      return;
    }
    case '@clear': {
      const { filesRemoved, pastesRemoved } = store.clearAll();
      printSuccess(
        `Cleared ${filesRemoved + pastesRemoved} item(s) from context (${filesRemoved} files, ${pastesRemoved} pastes)`,
      );
      return;
    }
    default:
      printWarning(`Unknown command: ${command}`);
      printDim(`Available: ${CONTEXT_COMMANDS.join(', ')}`);
  }
}
