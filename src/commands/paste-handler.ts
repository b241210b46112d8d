import chalk from 'chalk';
import inquirer from 'inquirer';
import type { Session } from '../session/state.js';
import { createPreview, type PasteStats } from '../context/paste-classifier.js';
import { printDim, printSuccess } from '../ui/output.js';

export type PasteAction = 'add' | 'send' | 'discard';

const PASTE_CHOICES: { name: string; value: PasteAction }[] = [
  { name: 'Add to context', value: 'add' },
  { name: 'Send directly as query', value: 'send' },
  { name: 'Discard', value: 'discard' },
];

export async function handlePaste(text: string, stats: PasteStats, session: Session): Promise<PasteAction> {
  console.log(chalk.cyan(`\n📋 Detected large text paste (${stats.lines} lines, ${stats.size})`));
  console.log(chalk.gray('Preview:'));
  console.log(
    chalk.gray(
      createPreview(text)
        .split('\n')
        .map((line) => `  ${line}`)
        .join('\n'),
    ),
  );

  const { action } = await inquirer.prompt<{ action: PasteAction }>([
    {
      type: 'list',
      name: 'action',
      message: 'What would you like to do?',
      choices: PASTE_CHOICES,
      default: 'add',
    },
  ]);

  if (action === 'add') {
    const id = session.context.addPaste(text);
    printSuccess(`Added as ${id} to context`);
  } else if (action === 'discard') {
    printDim('Discarded');
  }
  return action;
}
