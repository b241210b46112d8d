import type { QueryOptions, SearchChunk, SearchResponse } from '../types.js';

export type SearchResult = SearchResponse | AsyncIterable<SearchChunk>;

export interface AnswerProvider {
  search(query: string, options: QueryOptions, signal?: AbortSignal): Promise<SearchResult>;
}

export function isChunkStream(result: SearchResult): result is AsyncIterable<SearchChunk> {
  return typeof result === 'object' && result !== null && Symbol.asyncIterator in result;
}
