import type { QueryOptions, SearchChunk, SearchResponse, ServiceConfig } from '../types.js';
import type { AnswerProvider, SearchResult } from './base.js';
import { errorMessage, remoteCallFailure } from '../errors.js';
import { debugLog } from '../utils/debug.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Answer service client over HTTP. Non-streaming calls return the decoded JSON
 * body; streaming calls yield one chunk per `data:` line until `[DONE]`.
 */
export class HttpAnswerProvider implements AnswerProvider {
  private config: ServiceConfig;

  constructor(config: ServiceConfig) {
    this.config = config;
  }

  async search(query: string, options: QueryOptions, signal?: AbortSignal): Promise<SearchResult> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/search`;
    const body = {
      query,
      mode: options.mode,
      model: options.model,
      sources: options.sources,
      stream: options.stream,
      incognito: options.incognito,
    };

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: options.stream ? 'text/event-stream' : 'application/json',
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }
    if (this.config.cookie) {
      headers.Cookie = this.config.cookie;
    }

    debugLog('[answer-client] POST', url);
    debugLog('[answer-client] Mode:', options.mode, 'Model:', options.model, 'Query length:', query.length);

    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: combined,
      });
    } catch (error) {
      if (timeout.aborted) {
        throw remoteCallFailure(`Answer service timed out after ${this.config.timeoutMs}ms`, error);
      }
      if (signal?.aborted) {
        throw remoteCallFailure('Request cancelled', error);
      }
      throw remoteCallFailure(`Answer service unreachable: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      const error = await response.text();
      throw remoteCallFailure(`Answer service error (${response.status}): ${error}`);
    }

    if (options.stream) {
      return this.handleStream(response);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw remoteCallFailure(`Malformed response: ${errorMessage(error)}`, error);
    }
    if (!isRecord(data)) {
      return { text: data } satisfies SearchResponse;
    }
    return data;
  }

  private async *handleStream(response: Response): AsyncGenerator<SearchChunk> {
    const reader = response.body?.getReader();
    if (!reader) {
      throw remoteCallFailure('No response body');
    }

    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (!line.startsWith('data: ')) continue;

          const data = line.slice(6).trim();
          if (data === '[DONE]') {
            return;
          }

          try {
            const parsed: unknown = JSON.parse(data);
            if (isRecord(parsed)) {
              yield parsed;
            }
          } catch {
            debugLog('[answer-client] skipping malformed chunk');
          }
        }
      }
    } finally {
      reader.releaseLock();
    }
  }
}
