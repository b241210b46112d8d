#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { homedir } from 'os';
import { SEARCH_MODES } from './models.js';
import { getServiceConfig, loadProjectConfig, type QueryOverrides } from './config.js';
import { HttpAnswerProvider } from './providers/http.js';
import { Session } from './session/state.js';
import { REPL } from './repl.js';
import { handleAiQuery } from './commands/ai-query.js';
import { errorMessage } from './errors.js';
import { debugError, debugLog, isDebugEnabled } from './utils/debug.js';

interface CliOptions {
  model?: string;
  mode?: string;
  sources?: string;
  stream?: boolean;
  incognito?: boolean;
  home?: string;
  query?: string;
  listModels?: boolean;
}

const program = new Command();
program
  .name('ctxterm')
  .description('Navigate your files, collect context and ask questions about it from the terminal')
  .version('0.1.0')
  .option('-m, --model <model>', 'Model to use for answers')
  .option('--mode <mode>', 'Search mode (auto, pro, reasoning, deep research)')
  .option('--sources <list>', 'Comma-separated source types (web, scholar, social)')
  .option('--stream', 'Stream partial results')
  .option('--no-stream', 'Wait for the complete response')
  .option('--incognito', 'Ask without saving the question to the service history')
  .option('--no-incognito', 'Keep the question in the service history')
  .option('--home <dir>', 'Boundary root (defaults to the home directory)')
  .option('-q, --query <text>', 'Ask a single question and exit')
  .option('--list-models', 'List search modes and their models')
  .parse(process.argv);

const options = program.opts<CliOptions>();

function printModes(): void {
  console.log(chalk.cyan('\nSearch modes:\n'));
  for (const mode of Object.values(SEARCH_MODES)) {
    console.log(chalk.green(`  ${mode.name}`) + chalk.gray(`: ${mode.description}`));
    console.log(chalk.gray(`    Models: ${mode.models.join(', ')} (default ${mode.defaultModel})`));
  }
  console.log('');
}

async function main(): Promise<void> {
  if (options.listModels) {
    printModes();
    return;
  }

  const projectConfig = await loadProjectConfig();
  const overrides: QueryOverrides = {
    mode: options.mode,
    model: options.model,
    sources: options.sources,
    stream: options.stream,
    incognito: options.incognito,
  };
  const serviceConfig = getServiceConfig(overrides);
  debugLog('Project config:', projectConfig);
  debugLog('Service:', serviceConfig.baseUrl, serviceConfig.mode, serviceConfig.model);

  const session = await Session.create({
    homeDir: options.home ?? projectConfig.homeDir ?? homedir(),
    startDir: process.cwd(),
    provider: new HttpAnswerProvider(serviceConfig),
    queryOptions: {
      mode: serviceConfig.mode,
      model: serviceConfig.model,
      sources: serviceConfig.sources,
      stream: serviceConfig.stream,
      incognito: serviceConfig.incognito,
    },
    maxFileSize: projectConfig.maxFileSize,
    commandTimeoutMs: projectConfig.commandTimeoutMs,
    ignorePatterns: projectConfig.ignorePatterns,
  });

  if (options.query) {
    const outcome = await handleAiQuery(options.query, session);
    if (outcome.kind !== 'answered') {
      process.exitCode = 1;
    }
    return;
  }

  await new REPL(session).start();
}

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red(`\n❌ Unhandled promise rejection: ${errorMessage(reason)}\n`));
  if (isDebugEnabled() && reason instanceof Error && reason.stack) {
    console.error(chalk.gray(reason.stack));
  }
});

main()
  .then(() => {
    debugLog('main() completed');
    process.exit(process.exitCode ?? 0);
  })
  .catch((error: unknown) => {
    debugError('Error in main():', error);
    console.error(chalk.red(`\n❌ Error: ${errorMessage(error)}\n`));
    if (isDebugEnabled() && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exit(1);
  });
