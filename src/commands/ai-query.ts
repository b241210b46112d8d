import chalk from 'chalk';
import ora from 'ora';
import type { Session } from '../session/state.js';
import { collectResponse, stepsOf } from '../providers/collect.js';
import { extractAnswer, extractSources, formatSourceLines, type SourceLink } from '../query/response-extractor.js';
import { errorMessage } from '../errors.js';
import { printDim, printError, printWarning, rule } from '../ui/output.js';
import { debugError } from '../utils/debug.js';

export type QueryOutcome =
  | { kind: 'answered'; answer: string; sources: SourceLink[] }
  | { kind: 'cancelled' }
  | { kind: 'failed'; message: string };

export interface AiQueryOptions {
  signal?: AbortSignal;
}

function printAnswer(answer: string, sources: SourceLink[]): void {
  if (sources.length) {
    console.log(chalk.magenta.bold('\nWeb Sources Used:'));
    formatSourceLines(sources).forEach((line) => console.log(chalk.cyan(line)));
  }
  console.log(chalk.green(`\n${rule('Answer')}`));
  console.log(answer);
  console.log(chalk.green(rule()));
}

/**
 * Composes the question with the current context, sends it and renders the
 * answer. Only reads the context store; failures are reported, not thrown.
 */
export async function handleAiQuery(
  question: string,
  session: Session,
  options: AiQueryOptions = {},
): Promise<QueryOutcome> {
  const store = session.context;

  if (!store.isEmpty()) {
    printDim(
      `Sending query with ${store.fileCount + store.pasteCount} item(s) in context (${store.fileCount} files, ${store.pasteCount} pastes)...`,
    );
  }

  const composed = await store.composeForQuery(question);
  composed.warnings.forEach((warning) => printWarning(warning.message));
  if (composed.pasteCount > 0) {
    printDim(`Embedded ${composed.pasteCount} paste(s) into query`);
  }

  const spinner = ora('Processing query...').start();
  const started = Date.now();
  try {
    const result = await session.provider.search(composed.text, session.getQueryOptions(), options.signal);
    const response = await collectResponse(result);
    spinner.stop();
    session.tracker.recordQuestion(Date.now() - started, true);

    const answer = extractAnswer(response);
    const sources = extractSources(stepsOf(response));
    printAnswer(answer, sources);
    return { kind: 'answered', answer, sources };
  } catch (error) {
    session.tracker.recordQuestion(Date.now() - started, false);
    if (options.signal?.aborted) {
      spinner.warn('Query cancelled');
      return { kind: 'cancelled' };
    }
    spinner.fail('Query failed');
    debugError('handleAiQuery:', error);
    const message = errorMessage(error);
    printError(`Error: ${message}`);
    return { kind: 'failed', message };
  }
}
