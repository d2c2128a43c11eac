import { describe, it, expect } from 'vitest';
import {
  errorMessage,
  errorPayload,
  getPath,
  jsonPath,
  openAIDeltaContent,
  openAIMessageContent,
} from '../../src/streaming/extractors.js';

describe('getPath', () => {
  const value = { a: [{ b: 'found' }, null], n: 1 };

  it('walks objects and arrays', () => {
    expect(getPath(value, ['a', 0, 'b'])).toBe('found');
  });

  it('returns undefined on any mismatch along the way', () => {
    expect(getPath(value, ['a', 5, 'b'])).toBeUndefined();
    expect(getPath(value, ['n', 'x'])).toBeUndefined();
    expect(getPath(value, ['a', 'b'])).toBeUndefined();
    expect(getPath(value, ['a', 1, 'b'])).toBeUndefined();
  });
});

describe('jsonPath', () => {
  it('only yields strings', () => {
    const pick = jsonPath('v');
    expect(pick({ v: 'text' })).toBe('text');
    expect(pick({ v: 3 })).toBeNull();
  });
});

describe('OpenAI extractors', () => {
  it('read delta and message content', () => {
    expect(openAIDeltaContent({ choices: [{ delta: { content: 'd' } }] })).toBe('d');
    expect(openAIMessageContent({ choices: [{ message: { content: 'm' } }] })).toBe('m');
  });

  it('ignore role-only deltas', () => {
    expect(openAIDeltaContent({ choices: [{ delta: { role: 'assistant' } }] })).toBeNull();
  });
});

describe('errorPayload', () => {
  it('returns objects carrying a non-null error', () => {
    const payload = { error: { message: 'quota exceeded' } };
    expect(errorPayload(payload)).toBe(payload);
    expect(errorPayload({ error: null })).toBeNull();
    expect(errorPayload('error')).toBeNull();
  });

  it('describes string, object and unknown error shapes', () => {
    expect(errorMessage({ error: 'plain' })).toBe('plain');
    expect(errorMessage({ error: { message: 'nested' } })).toBe('nested');
    expect(errorMessage({ error: { code: 7 } })).toBe('{"code":7}');
  });
});
