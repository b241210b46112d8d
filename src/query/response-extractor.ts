import type { Step } from '../types.js';
import { errorMessage } from '../errors.js';

export const NO_RESPONSE_ERROR = 'Error: No response from answer service';
export const EMPTY_STEPS_ERROR = 'Error: Empty steps list';

export const FINAL_STEP = 'FINAL';
export const SEARCH_RESULTS_STEP = 'SEARCH_RESULTS';

type Mapping = Record<string, unknown>;

export type DecodedResponse =
  | { kind: 'missing' }
  | { kind: 'text'; text: string }
  | { kind: 'mapping'; value: Mapping }
  | { kind: 'steps'; steps: unknown[] }
  | { kind: 'unrecognized'; typeName: string };

export interface SourceLink {
  name: string;
  url: string;
  domain: string;
}

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStep(value: unknown): value is Step {
  return isMapping(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}

/**
 * Classifies the `text` field of a response into one of the known shapes.
 */
export function decodeResponse(response: unknown): DecodedResponse {
  if (!isMapping(response) || !('text' in response) || response.text === undefined || response.text === null) {
    return { kind: 'missing' };
  }
  const text = response.text;
  if (typeof text === 'string') return { kind: 'text', text };
  if (Array.isArray(text)) return { kind: 'steps', steps: text };
  if (isMapping(text)) return { kind: 'mapping', value: text };
  return { kind: 'unrecognized', typeName: describeType(text) };
}

/**
 * The nested `answer` of a final step may be a JSON document carrying its
 * own `answer`, a mapping, or plain text.
 */
function decodeAnswerField(answer: unknown): string {
  if (typeof answer === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(answer);
    } catch {
      return answer;
    }
    if (isMapping(parsed)) {
      return 'answer' in parsed ? stringify(parsed.answer) : stringify(parsed);
    }
    return answer;
  }
  if (isMapping(answer)) {
    return 'answer' in answer ? stringify(answer.answer) : stringify(answer);
  }
  return stringify(answer);
}

function decodeFinalStep(step: Step): string {
  const content = step.content;
  if (isMapping(content) && 'answer' in content) {
    return decodeAnswerField(content.answer);
  }
  return stringify(content);
}

function decodeSteps(steps: unknown[]): string {
  if (steps.length === 0) {
    return EMPTY_STEPS_ERROR;
  }

  const finalStep = steps.find((step): step is Step => isStep(step) && step.step_type === FINAL_STEP);
  if (finalStep && 'content' in finalStep) {
    return decodeFinalStep(finalStep);
  }

  const lastStep = steps[steps.length - 1];
  if (isStep(lastStep) && 'content' in lastStep) {
    return stringify(lastStep.content);
  }
  return stringify(lastStep);
}

/**
 * Human-readable answer from a loosely structured response. Never throws:
 * failures come back as descriptive `Error...` strings.
 */
export function extractAnswer(response: unknown): string {
  try {
    const decoded = decodeResponse(response);
    switch (decoded.kind) {
      case 'missing':
        return NO_RESPONSE_ERROR;
      case 'text':
        return decoded.text;
      case 'mapping':
        return stringify(decoded.value);
      case 'steps':
        return decodeSteps(decoded.steps);
      case 'unrecognized':
        return `Error: Unknown text format: ${decoded.typeName}`;
    }
  } catch (error) {
    return `Error parsing steps: ${errorMessage(error)}`;
  }
}

/**
 * Host portion of a URL: what follows the scheme, up to the first `/`.
 */
export function bareDomain(url: string): string {
  const afterScheme = url.split('//').pop() ?? url;
  return afterScheme.split('/')[0];
}

/**
 * Web results of the first search-results step, if any.
 */
export function extractSources(steps: unknown[]): SourceLink[] {
  const searchStep = steps.find(
    (step): step is Step => isStep(step) && step.step_type === SEARCH_RESULTS_STEP,
  );
  if (!searchStep || !isMapping(searchStep.content)) {
    return [];
  }

  const results = searchStep.content.web_results;
  if (!Array.isArray(results)) {
    return [];
  }

  return results.filter(isMapping).map((result) => {
    const name = typeof result.name === 'string' ? result.name : '-';
    const url = typeof result.url === 'string' ? result.url : '-';
    return { name, url, domain: bareDomain(url) };
  });
}

export function formatSourceLines(sources: SourceLink[]): string[] {
  return sources.map((source, index) => `${index + 1}. ${source.name} - ${source.domain}`);
}
