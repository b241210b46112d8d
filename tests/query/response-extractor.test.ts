import { describe, it, expect } from 'vitest';
import {
  bareDomain,
  decodeResponse,
  EMPTY_STEPS_ERROR,
  extractAnswer,
  extractSources,
  formatSourceLines,
  NO_RESPONSE_ERROR,
} from '../../src/query/response-extractor.js';

describe('decodeResponse', () => {
  it('should classify each shape of the text field', () => {
    expect(decodeResponse(null)).toEqual({ kind: 'missing' });
    expect(decodeResponse({})).toEqual({ kind: 'missing' });
    expect(decodeResponse({ text: null })).toEqual({ kind: 'missing' });
    expect(decodeResponse({ text: 'plain' })).toEqual({ kind: 'text', text: 'plain' });
    expect(decodeResponse({ text: [] })).toEqual({ kind: 'steps', steps: [] });
    expect(decodeResponse({ text: { a: 1 } })).toEqual({ kind: 'mapping', value: { a: 1 } });
    expect(decodeResponse({ text: 7 })).toEqual({ kind: 'unrecognized', typeName: 'number' });
  });
});

describe('extractAnswer', () => {
  it('should report a missing response', () => {
    expect(extractAnswer(undefined)).toBe(NO_RESPONSE_ERROR);
    expect(extractAnswer({ other: true })).toBe(NO_RESPONSE_ERROR);
  });

  it('should report an empty step list distinctly', () => {
    expect(extractAnswer({ text: [] })).toBe(EMPTY_STEPS_ERROR);
    expect(EMPTY_STEPS_ERROR).not.toBe(NO_RESPONSE_ERROR);
  });

  it('should return plain text as is', () => {
    expect(extractAnswer({ text: 'The answer is 4.' })).toBe('The answer is 4.');
  });

  it('should serialise a mapping text field', () => {
    expect(extractAnswer({ text: { summary: 'ok' } })).toBe('{"summary":"ok"}');
  });

  it('should describe an unknown text type', () => {
    expect(extractAnswer({ text: true })).toBe('Error: Unknown text format: boolean');
  });

  it('should unwrap a JSON-encoded answer in the final step', () => {
    const response = {
      text: [
        { step_type: 'INITIAL_QUERY', content: { query: 'q' } },
        { step_type: 'FINAL', content: { answer: JSON.stringify({ answer: 'Paris', chunks: [] }) } },
      ],
    };
    expect(extractAnswer(response)).toBe('Paris');
  });

  it('should serialise a JSON-encoded answer without its own answer field', () => {
    const response = { text: [{ step_type: 'FINAL', content: { answer: '{"value":1}' } }] };
    expect(extractAnswer(response)).toBe('{"value":1}');
  });

  it('should return a plain-text answer when it is not JSON', () => {
    const response = { text: [{ step_type: 'FINAL', content: { answer: 'Just text' } }] };
    expect(extractAnswer(response)).toBe('Just text');
  });

  it('should keep a JSON answer that decodes to a non-mapping as the raw string', () => {
    const response = { text: [{ step_type: 'FINAL', content: { answer: '42' } }] };
    expect(extractAnswer(response)).toBe('42');
  });

  it('should read the answer field of a mapping answer', () => {
    const response = { text: [{ step_type: 'FINAL', content: { answer: { answer: 'nested' } } }] };
    expect(extractAnswer(response)).toBe('nested');
  });

  it('should serialise final content without an answer field', () => {
    const response = { text: [{ step_type: 'FINAL', content: { note: 'n' } }] };
    expect(extractAnswer(response)).toBe('{"note":"n"}');
  });

  it('should fall back to the content of the last step when no step is final', () => {
    const response = {
      text: [
        { step_type: 'SEARCH_RESULTS', content: { web_results: [] } },
        { step_type: 'ANSWER_DRAFT', content: 'draft answer' },
      ],
    };
    expect(extractAnswer(response)).toBe('draft answer');
  });

  it('should serialise a last step that has no content', () => {
    expect(extractAnswer({ text: [{ step_type: 'PENDING' }] })).toBe('{"step_type":"PENDING"}');
    expect(extractAnswer({ text: ['raw'] })).toBe('raw');
  });
});

describe('bareDomain', () => {
  it('should strip scheme and path', () => {
    expect(bareDomain('https://example.com/docs/page')).toBe('example.com');
    expect(bareDomain('example.org/path')).toBe('example.org');
    expect(bareDomain('http://sub.example.net')).toBe('sub.example.net');
  });
});

describe('extractSources', () => {
  const steps = [
    { step_type: 'INITIAL_QUERY', content: {} },
    {
      step_type: 'SEARCH_RESULTS',
      content: {
        web_results: [
          { name: 'Example Docs', url: 'https://example.com/docs' },
          { url: 'https://example.org/a' },
          'not-a-result',
        ],
      },
    },
    { step_type: 'SEARCH_RESULTS', content: { web_results: [{ name: 'Later', url: 'https://later.test' }] } },
  ];

  it('should read web results from the first search-results step', () => {
    expect(extractSources(steps)).toEqual([
      { name: 'Example Docs', url: 'https://example.com/docs', domain: 'example.com' },
      { name: '-', url: 'https://example.org/a', domain: 'example.org' },
    ]);
  });

  it('should return nothing without a search-results step', () => {
    expect(extractSources([{ step_type: 'FINAL', content: { answer: 'x' } }])).toEqual([]);
    expect(extractSources([{ step_type: 'SEARCH_RESULTS', content: { web_results: 'bad' } }])).toEqual([]);
  });

  it('should number source lines from one', () => {
    expect(formatSourceLines(extractSources(steps))).toEqual(['1. Example Docs - example.com', '2. - - example.org']);
  });
});
