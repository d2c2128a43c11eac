import { describe, it, expect, vi } from 'vitest';
import { sanitizeStream, collectText } from '../../src/streaming/sanitize.js';
import { errorPayload, openAIDeltaContent, openAIMessageContent } from '../../src/streaming/extractors.js';
import { ConfigurationError } from '../../src/types/errors.js';
import {
  type ExtractedValue,
  type ExtractorFn,
  type JsonObject,
  type StreamLogger,
  type TextChunk,
} from '../../src/types/stream.js';
import { bytes, chunksOf, collect, openAISseBody } from '../fixtures/streams.js';

const openAIOptions = {
  introValue: 'data:',
  toJson: true,
  skipMarkers: ['[DONE]'],
  contentExtractor: openAIDeltaContent,
} as const;

describe('sanitizeStream', () => {
  it('yields OpenAI SSE deltas and stops at [DONE]', async () => {
    const lines = [
      'data: {"choices":[{"delta":{"content":"Hel"}}]}',
      'data: {"choices":[{"delta":{"content":"lo"}}]}',
      'data: [DONE]',
      'data: {"choices":[{"delta":{"content":"after"}}]}',
    ];

    const deltas = await collect(sanitizeStream(lines.join('\n'), { ...openAIOptions, raw: true }));

    expect(deltas).toEqual(['Hel', 'lo']);
    expect(deltas.join('')).toBe('Hello');
  });

  it('wraps text deltas in envelopes unless raw is requested', async () => {
    const chunks = await collect(sanitizeStream(openAISseBody(['a', 'b']), openAIOptions));
    expect(chunks).toEqual([{ text: 'a' }, { text: 'b' }]);
  });

  it('passes structured extractor values through in both modes', async () => {
    const failure: ExtractorFn<JsonObject> = (value) => errorPayload(value);
    const body = 'data: {"error":{"message":"quota"}}\n';

    const options = { introValue: 'data:', toJson: true, contentExtractor: failure };

    const raw = await collect(sanitizeStream(body, { ...options, raw: true }));
    const wrapped = await collect(sanitizeStream(body, options));

    expect(raw).toEqual([{ error: { message: 'quota' } }]);
    expect(wrapped).toEqual([{ error: { message: 'quota' } }]);
  });

  it('drops malformed JSON frames and keeps going', async () => {
    const body = 'data: {not json\ndata: {"choices":[{"delta":{"content":"ok"}}]}\n';
    const deltas = await collect(sanitizeStream(body, { ...openAIOptions, raw: true }));
    expect(deltas).toEqual(['ok']);
  });

  it('cleans raw text with an extractor function', async () => {
    const strip: ExtractorFn = (value) =>
      typeof value === 'string' ? value.replace(/^k\(/, '').replace(/@$/, '') : null;
    const deltas = await collect(sanitizeStream('k(Hello!@', { contentExtractor: strip, raw: true }));
    expect(deltas).toEqual(['Hello!']);
  });

  it('extracts data stream text parts with a regex', async () => {
    const body = '0:"Bon"\n0:"jour"\ne:{"finishReason":"stop"}\n';
    const deltas = await collect(
      sanitizeStream(body, { extractRegexes: ['0:"(.*?)"(?=,|$)'], raw: true })
    );
    expect(deltas).toEqual(['Bon', 'jour']);
  });

  it('skips wrapper frames before extract rules see them', async () => {
    const body = [
      '<details type="reasoning">"delta":"hidden"</details>',
      '"delta":"shown"',
    ].join('\n');

    const deltas = await collect(
      sanitizeStream(body, {
        rules: [
          { pattern: /<details[^>]*>.*?<\/details>/, action: 'skip' },
          { pattern: /"delta":"(.*?)"/, action: 'extract' },
        ],
        raw: true,
      })
    );

    expect(deltas).toEqual(['shown']);
  });

  it('gives the same output for byte chunks cut at every position', async () => {
    const body = bytes(openAISseBody(['héllo', ' wörld', '!']));
    const expected = await collect(sanitizeStream(body, { ...openAIOptions, raw: true }));
    expect(expected).toEqual(['héllo', ' wörld', '!']);

    for (let cut = 1; cut < body.length; cut += 5) {
      const source = chunksOf([body.slice(0, cut), body.slice(cut)]);
      const deltas = await collect(sanitizeStream(source, { ...openAIOptions, raw: true }));
      expect(deltas).toEqual(expected);
    }
  });

  it('decodes a non-streaming body as one frame', async () => {
    const body = JSON.stringify({ choices: [{ message: { content: 'whole answer' } }] }, null, 2);
    const deltas = await collect(
      sanitizeStream(chunksOf([body.slice(0, 10), body.slice(10)]), {
        framing: 'buffer',
        toJson: true,
        contentExtractor: openAIMessageContent,
        raw: true,
      })
    );
    expect(deltas).toEqual(['whole answer']);
  });

  it('does not pull the source past the sentinel', async () => {
    let pulled = 0;
    async function* source() {
      const chunks = ['data: {"choices":[{"delta":{"content":"x"}}]}\n', 'data: [DONE]\n', 'data: tail\n'];
      for (const chunk of chunks) {
        pulled++;
        yield chunk;
      }
    }

    await collect(sanitizeStream(source(), { ...openAIOptions, raw: true }));
    expect(pulled).toBe(2);
  });

  it('logs the sentinel through the configured logger', async () => {
    const logger: StreamLogger = { debug: vi.fn() };
    await collect(sanitizeStream('data: [DONE]\n', { ...openAIOptions, logger }));
    expect(logger.debug).toHaveBeenCalledWith({ frameIndex: 1 }, 'stream: sentinel reached');
  });

  describe('configuration errors', () => {
    it('rejects an invalid pattern before reading the source', () => {
      const source = { [Symbol.asyncIterator]: vi.fn() };
      expect(() => sanitizeStream(source, { extractRegexes: ['(bad'] })).toThrow(ConfigurationError);
      expect(source[Symbol.asyncIterator]).not.toHaveBeenCalled();
    });

    it('rejects an unknown encoding', () => {
      expect(() => sanitizeStream('x', { encoding: 'no-such-charset' })).toThrow(ConfigurationError);
    });

    it('rejects an empty intro value', () => {
      expect(() => sanitizeStream('x', { introValue: '' })).toThrow(ConfigurationError);
    });
  });
});

describe('collectText', () => {
  it('joins strings and envelope text, ignoring structured values', async () => {
    const text = await collectText(chunksOf<ExtractedValue | TextChunk>(['a', { text: 'b' }, { other: 1 }, 'c']));
    expect(text).toBe('abc');
  });
});
