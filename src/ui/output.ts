import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`⚠️  ${message}`));
}

export function printError(message: string): void {
  console.error(chalk.red(`❌ ${message}`));
}

export function printDim(message: string): void {
  console.log(chalk.gray(message));
}

export function rule(title?: string, width = 60): string {
  if (!title) return '─'.repeat(width);
  const label = ` ${title} `;
  const side = Math.max(2, Math.floor((width - label.length) / 2));
  return `${'─'.repeat(side)}${label}${'─'.repeat(side)}`;
}

export function printHeader(): void {
  console.log(chalk.cyan(rule()));
  console.log(chalk.cyan.bold('  ctxterm · Interactive Filesystem + AI Query'));
  console.log(chalk.gray('  Navigate with ls/cd/pwd/cat/tree, curate context with @add/@remove/@list/@clear.'));
  console.log(chalk.cyan(rule()));
}

export function printFooter(now: Date = new Date()): void {
  const time = now.toTimeString().slice(0, 8);
  console.log(chalk.gray(`\nSession ended at ${time}\n`));
}
