import type { SearchChunk, SearchResponse } from '../types.js';
import { errorMessage, isCtxtermError, remoteCallFailure } from '../errors.js';
import { isChunkStream, type SearchResult } from './base.js';

export function stepsOf(payload: SearchChunk | SearchResponse): unknown[] {
  return Array.isArray(payload.text) ? payload.text : [];
}

/**
 * Turns a provider result into a single response. A chunk stream is
 * accumulated into one step list in arrival order; stream failures surface
 * as remote call failures.
 */
export async function collectResponse(result: SearchResult): Promise<SearchResponse> {
  if (!isChunkStream(result)) {
    return result;
  }

  const steps: unknown[] = [];
  try {
    for await (const chunk of result) {
      steps.push(...stepsOf(chunk));
    }
  } catch (error) {
    if (isCtxtermError(error)) throw error;
    throw remoteCallFailure(`Stream interrupted: ${errorMessage(error)}`, error);
  }
  return { text: steps };
}
