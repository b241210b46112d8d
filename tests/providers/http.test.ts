import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HttpAnswerProvider } from '../../src/providers/http.js';
import { isChunkStream } from '../../src/providers/base.js';
import type { QueryOptions, SearchChunk, ServiceConfig } from '../../src/types.js';

const mockFetch = vi.fn<typeof fetch>();

const options: QueryOptions = {
  mode: 'pro',
  model: 'gpt-5.1',
  sources: ['web'],
  stream: false,
  incognito: false,
};

function configWith(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return { ...options, baseUrl: 'http://answers.test/', timeoutMs: 1000, ...overrides };
}

function requestInit(callIndex = 0): RequestInit {
  const init = mockFetch.mock.calls[callIndex][1];
  if (!init) {
    throw new Error('fetch was called without init');
  }
  return init;
}

function rejectOnAbort(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason));
  });
}

async function drain(stream: AsyncIterable<SearchChunk>): Promise<SearchChunk[]> {
  const chunks: SearchChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('HttpAnswerProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post the query and options to the search endpoint', async () => {
    mockFetch.mockResolvedValue(new Response(JSON.stringify({ text: 'hi' }), { status: 200 }));
    const provider = new HttpAnswerProvider(configWith({ apiKey: 'test-key', cookie: 'session=test' }));

    const result = await provider.search('What is 2+2?', options);

    expect(result).toEqual({ text: 'hi' });
    expect(mockFetch.mock.calls[0][0]).toBe('http://answers.test/search');
    const init = requestInit();
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json',
      Authorization: 'Bearer test-key',
      Cookie: 'session=test',
    });
    expect(typeof init.body === 'string' ? JSON.parse(init.body) : null).toEqual({
      query: 'What is 2+2?',
      mode: 'pro',
      model: 'gpt-5.1',
      sources: ['web'],
      stream: false,
      incognito: false,
    });
  });

  it('should omit credentials that are not configured', async () => {
    mockFetch.mockResolvedValue(new Response('{}', { status: 200 }));
    await new HttpAnswerProvider(configWith()).search('q', options);

    expect(requestInit().headers).toEqual({ 'Content-Type': 'application/json', Accept: 'application/json' });
  });

  it('should wrap a non-object body as the text field', async () => {
    mockFetch.mockResolvedValue(new Response(JSON.stringify(['a', 'b']), { status: 200 }));

    const result = await new HttpAnswerProvider(configWith()).search('q', options);

    expect(result).toEqual({ text: ['a', 'b'] });
  });

  it('should fail with the status and body on an error response', async () => {
    mockFetch.mockResolvedValue(new Response('rate limited', { status: 429 }));

    await expect(new HttpAnswerProvider(configWith()).search('q', options)).rejects.toMatchObject({
      code: 'REMOTE_CALL_FAILURE',
      message: 'Answer service error (429): rate limited',
    });
  });

  it('should fail on a body that is not JSON', async () => {
    mockFetch.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

    const failure = new HttpAnswerProvider(configWith()).search('q', options);

    await expect(failure).rejects.toMatchObject({
      name: 'CtxtermError',
      code: 'REMOTE_CALL_FAILURE',
      message: expect.stringMatching(/^Malformed response: /),
      cause: expect.any(SyntaxError),
    });
  });

  it('should report an unreachable service', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(new HttpAnswerProvider(configWith()).search('q', options)).rejects.toThrow(
      'Answer service unreachable: fetch failed',
    );
  });

  it('should time out a slow service', async () => {
    mockFetch.mockImplementation(rejectOnAbort);

    await expect(new HttpAnswerProvider(configWith({ timeoutMs: 20 })).search('q', options)).rejects.toThrow(
      'Answer service timed out after 20ms',
    );
  });

  it('should report a cancelled request', async () => {
    mockFetch.mockImplementation(rejectOnAbort);
    const controller = new AbortController();
    controller.abort();

    await expect(new HttpAnswerProvider(configWith()).search('q', options, controller.signal)).rejects.toThrow(
      'Request cancelled',
    );
  });

  it('should stream server-sent chunks until done', async () => {
    const body = [
      'data: {"text":[{"step_type":"SEARCH_RESULTS","content":{"web_results":[]}}]}',
      '',
      ': keep-alive',
      'data: not-json',
      'data: {"text":[{"step_type":"FINAL","content":{"answer":"4"}}]}',
      'data: [DONE]',
      'data: {"text":["after done"]}',
      '',
    ].join('\n');
    mockFetch.mockResolvedValue(new Response(body, { status: 200 }));

    const result = await new HttpAnswerProvider(configWith()).search('q', { ...options, stream: true });

    expect(requestInit().headers).toMatchObject({ Accept: 'text/event-stream' });
    if (!isChunkStream(result)) {
      throw new Error('expected a chunk stream');
    }
    expect(await drain(result)).toEqual([
      { text: [{ step_type: 'SEARCH_RESULTS', content: { web_results: [] } }] },
      { text: [{ step_type: 'FINAL', content: { answer: '4' } }] },
    ]);
  });
});
