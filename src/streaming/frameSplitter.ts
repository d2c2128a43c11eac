import { type Framing, type RawChunk, type StreamSource } from '../types/stream.js';
import { DEFAULT_ENCODING, DEFAULT_LINE_DELIMITER } from './config.js';

export interface FrameSplitterOptions {
  introValue?: string | null;
  encoding?: string;
  framing?: Framing;
  lineDelimiter?: string;
}

/**
 * Incremental splitter: feed it chunks of any size with push(), collect the
 * complete frames it returns, and call flush() once the source is exhausted.
 *
 * Bytes go through a streaming TextDecoder in replacement mode, so a
 * multi-byte character cut between two chunks is reassembled and invalid
 * sequences become U+FFFD instead of throwing.
 */
export class FrameSplitter {
  private buffer = '';
  private readonly decoder: InstanceType<typeof TextDecoder>;
  private readonly introValue: string | null;
  private readonly framing: Framing;
  private readonly delimiter: string;
  private pendingBytes = false;

  constructor(options: FrameSplitterOptions = {}) {
    this.decoder = new TextDecoder(options.encoding ?? DEFAULT_ENCODING, { fatal: false });
    this.introValue = options.introValue ?? null;
    this.framing = options.framing ?? 'lines';
    this.delimiter = options.lineDelimiter ?? DEFAULT_LINE_DELIMITER;
  }

  push(chunk: RawChunk): string[] {
    if (typeof chunk === 'string') {
      this.flushDecoder();
      this.buffer += chunk;
    } else {
      this.buffer += this.decoder.decode(chunk, { stream: true });
      this.pendingBytes = true;
    }

    if (this.framing === 'buffer') return [];
    return this.drainLines();
  }

  flush(): string[] {
    this.flushDecoder();
    const rest = this.buffer;
    this.buffer = '';

    if (this.framing === 'buffer') {
      const frame = this.stripIntro(rest);
      return [frame ?? rest];
    }

    if (rest === '') return [];
    const frame = this.toFrame(rest);
    return frame === null ? [] : [frame];
  }

  private drainLines(): string[] {
    const frames: string[] = [];
    let index = this.buffer.indexOf(this.delimiter);

    while (index !== -1) {
      const line = this.buffer.slice(0, index);
      this.buffer = this.buffer.slice(index + this.delimiter.length);

      const frame = this.toFrame(line);
      if (frame !== null) frames.push(frame);

      index = this.buffer.indexOf(this.delimiter);
    }

    return frames;
  }

  private toFrame(line: string): string | null {
    const text = this.delimiter === '\n' && line.endsWith('\r') ? line.slice(0, -1) : line;
    if (this.introValue === null) return text;
    return this.stripIntro(text);
  }

  /**
   * Returns the payload after the intro prefix, or null when the text does
   * not carry it. One space after the prefix belongs to the framing.
   */
  private stripIntro(text: string): string | null {
    if (this.introValue === null) return text;

    const candidate = text.trimStart();
    if (!candidate.startsWith(this.introValue)) return null;

    const payload = candidate.slice(this.introValue.length);
    return payload.startsWith(' ') ? payload.slice(1) : payload;
  }

  private flushDecoder(): void {
    if (!this.pendingBytes) return;
    this.buffer += this.decoder.decode();
    this.pendingBytes = false;
  }
}

/**
 * Normalize any accepted source shape into an async iterable of chunks.
 */
export function toChunkIterable(source: StreamSource): AsyncIterable<RawChunk> {
  if (typeof source === 'string' || source instanceof Uint8Array) {
    const chunk = source;
    return (async function* single() {
      yield chunk;
    })();
  }

  if (isAsyncIterable(source)) return source;

  const chunks = source;
  return (async function* fromSync() {
    yield* chunks;
  })();
}

function isAsyncIterable(
  source: Iterable<RawChunk> | AsyncIterable<RawChunk>
): source is AsyncIterable<RawChunk> {
  return Symbol.asyncIterator in source;
}

/**
 * Lazily split a source into frames. Pulls the next chunk only when the
 * consumer asks for the next frame.
 */
export async function* splitFrames(
  source: StreamSource,
  options: FrameSplitterOptions = {}
): AsyncGenerator<string, void, undefined> {
  const splitter = new FrameSplitter(options);

  for await (const chunk of toChunkIterable(source)) {
    yield* splitter.push(chunk);
  }

  yield* splitter.flush();
}
