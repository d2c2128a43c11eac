import { describe, it, expect } from 'vitest';
import { FrameSplitter, splitFrames, toChunkIterable } from '../../src/streaming/frameSplitter.js';
import { bytes, chunksOf, collect } from '../fixtures/streams.js';

describe('FrameSplitter', () => {
  describe('line framing', () => {
    it('splits a single string on newlines', async () => {
      const frames = await collect(splitFrames('a\nb\nc'));
      expect(frames).toEqual(['a', 'b', 'c']);
    });

    it('emits a frame only once its delimiter arrives', () => {
      const splitter = new FrameSplitter();
      expect(splitter.push('hel')).toEqual([]);
      expect(splitter.push('lo\nwor')).toEqual(['hello']);
      expect(splitter.push('ld')).toEqual([]);
      expect(splitter.flush()).toEqual(['world']);
    });

    it('strips a trailing carriage return from CRLF lines', async () => {
      const frames = await collect(splitFrames('one\r\ntwo\r\n'));
      expect(frames).toEqual(['one', 'two']);
    });

    it('keeps empty lines as frames', async () => {
      const frames = await collect(splitFrames('a\n\nb\n'));
      expect(frames).toEqual(['a', '', 'b']);
    });

    it('emits nothing on flush when the buffer is empty', () => {
      const splitter = new FrameSplitter();
      splitter.push('a\n');
      expect(splitter.flush()).toEqual([]);
    });

    it('honours a custom delimiter', async () => {
      const frames = await collect(splitFrames('x||y||z', { lineDelimiter: '||' }));
      expect(frames).toEqual(['x', 'y', 'z']);
    });

    it('yields the same frames however the input is chunked', async () => {
      const body = 'data: first\n\ndata: second\ndata: third';
      const whole = await collect(splitFrames(body, { introValue: 'data:' }));

      for (const size of [1, 2, 3, 7]) {
        const pieces: string[] = [];
        for (let i = 0; i < body.length; i += size) pieces.push(body.slice(i, i + size));
        const frames = await collect(splitFrames(chunksOf(pieces), { introValue: 'data:' }));
        expect(frames).toEqual(whole);
      }

      expect(whole).toEqual(['first', 'second', 'third']);
    });
  });

  describe('intro prefix', () => {
    it('strips the prefix and one following space', async () => {
      const frames = await collect(splitFrames('data: {"a":1}\ndata:  two\n', { introValue: 'data:' }));
      expect(frames).toEqual(['{"a":1}', ' two']);
    });

    it('drops lines that do not carry the prefix', async () => {
      const frames = await collect(
        splitFrames('event: ping\ndata: hi\n: comment\n', { introValue: 'data:' })
      );
      expect(frames).toEqual(['hi']);
    });

    it('tolerates leading whitespace before the prefix', async () => {
      const frames = await collect(splitFrames('   data: x\n', { introValue: 'data:' }));
      expect(frames).toEqual(['x']);
    });
  });

  describe('byte decoding', () => {
    it('reassembles a multi-byte character split across chunks', async () => {
      const encoded = bytes('héllo\n');
      // "é" is two bytes in UTF-8: split between them
      const source = [encoded.slice(0, 2), encoded.slice(2)];
      const frames = await collect(splitFrames(chunksOf(source)));
      expect(frames).toEqual(['héllo']);
    });

    it('replaces invalid byte sequences instead of throwing', async () => {
      const source = new Uint8Array([0x61, 0xff, 0x62, 0x0a]);
      const frames = await collect(splitFrames(source));
      expect(frames).toEqual(['a\uFFFDb']);
    });

    it('decodes with the configured charset', async () => {
      const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);
      const frames = await collect(splitFrames(latin1, { encoding: 'latin1' }));
      expect(frames).toEqual(['café']);
    });

    it('flushes pending bytes before appending a string chunk', async () => {
      const encoded = bytes('é');
      const frames = await collect(splitFrames(chunksOf([encoded.slice(0, 1), 'x\n'])));
      expect(frames).toEqual(['\uFFFDx']);
    });
  });

  describe('buffer framing', () => {
    it('emits the whole body as one frame at the end', async () => {
      const frames = await collect(
        splitFrames(chunksOf(['{"a":', '\n1}']), { framing: 'buffer' })
      );
      expect(frames).toEqual(['{"a":\n1}']);
    });

    it('strips the intro from the buffered body when present', async () => {
      const frames = await collect(
        splitFrames('data: {"x":1}', { framing: 'buffer', introValue: 'data:' })
      );
      expect(frames).toEqual(['{"x":1}']);
    });

    it('emits an empty frame for an empty body', async () => {
      const frames = await collect(splitFrames('', { framing: 'buffer' }));
      expect(frames).toEqual(['']);
    });
  });

  describe('toChunkIterable', () => {
    it('accepts synchronous iterables', async () => {
      const chunks = await collect(toChunkIterable(['a', 'b']));
      expect(chunks).toEqual(['a', 'b']);
    });

    it('passes async iterables through untouched', () => {
      const source = chunksOf(['a']);
      expect(toChunkIterable(source)).toBe(source);
    });
  });

  it('pulls from the source only as frames are requested', async () => {
    let pulled = 0;
    async function* source() {
      for (const chunk of ['a\n', 'b\n', 'c\n']) {
        pulled++;
        yield chunk;
      }
    }

    const frames = splitFrames(source());
    const first = await frames.next();
    expect(first.value).toBe('a');
    expect(pulled).toBe(1);
    await frames.return();
    expect(pulled).toBe(1);
  });
});
