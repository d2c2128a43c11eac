import { describe, it, expect } from 'vitest';
import { decodeFrame, isTerminator } from '../../src/streaming/frameDecoder.js';

const json = { toJson: true, yieldRawOnError: false };

describe('decodeFrame', () => {
  it('drops blank frames', () => {
    expect(decodeFrame('   ', json)).toEqual({ kind: 'dropped', reason: 'blank' });
  });

  it('returns the text itself when JSON decoding is off', () => {
    expect(decodeFrame('plain', { toJson: false, yieldRawOnError: false })).toEqual({
      kind: 'value',
      value: 'plain',
    });
  });

  it('parses JSON objects and scalars', () => {
    expect(decodeFrame('{"a":[1,true,null]}', json)).toEqual({
      kind: 'value',
      value: { a: [1, true, null] },
    });
    expect(decodeFrame('42', json)).toEqual({ kind: 'value', value: 42 });
  });

  it('retries once without a trailing comma', () => {
    expect(decodeFrame('{"row":1},', json)).toEqual({ kind: 'value', value: { row: 1 } });
  });

  it('drops malformed JSON by default', () => {
    expect(decodeFrame('{"a":', json)).toEqual({ kind: 'dropped', reason: 'malformed' });
  });

  it('hands malformed JSON back verbatim when asked to', () => {
    expect(decodeFrame('not json', { toJson: true, yieldRawOnError: true })).toEqual({
      kind: 'raw',
      text: 'not json',
    });
  });
});

describe('isTerminator', () => {
  it('matches a sentinel after trimming', () => {
    expect(isTerminator(' [DONE] ', ['[DONE]'])).toBe(true);
  });

  it('does not match sentinels embedded in content', () => {
    expect(isTerminator('the [DONE] marker', ['[DONE]'])).toBe(false);
  });

  it('never matches without markers', () => {
    expect(isTerminator('[DONE]', [])).toBe(false);
  });
});
