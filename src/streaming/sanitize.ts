import {
  type ExtractedValue,
  type RawContent,
  type SanitizeOptions,
  type StreamConfig,
  type StreamSource,
  type TextChunk,
  type WrappedContent,
} from '../types/stream.js';
import { resolveStreamConfig } from './config.js';
import { splitFrames } from './frameSplitter.js';
import { isTerminator } from './frameDecoder.js';
import { ContentExtractor } from './contentExtractor.js';

/**
 * Normalize a raw upstream body into content deltas.
 *
 * Options are validated eagerly: a bad pattern or encoding throws
 * ConfigurationError from this call, before the source is touched.
 * The returned generator is lazy and pulls from `source` only on demand.
 *
 * @example
 * ```typescript
 * const deltas = sanitizeStream(response.body, {
 *   introValue: 'data:',
 *   toJson: true,
 *   skipMarkers: ['[DONE]'],
 *   contentExtractor: openAIDeltaContent,
 *   raw: true,
 * });
 * for await (const delta of deltas) process.stdout.write(delta);
 * ```
 */
export function sanitizeStream<T extends ExtractedValue = string>(
  source: StreamSource,
  options: SanitizeOptions<T> & { raw: true }
): AsyncGenerator<RawContent<T>, void, undefined>;
export function sanitizeStream<T extends ExtractedValue = string>(
  source: StreamSource,
  options?: SanitizeOptions<T> & { raw?: false }
): AsyncGenerator<WrappedContent, void, undefined>;
export function sanitizeStream<T extends ExtractedValue = string>(
  source: StreamSource,
  options?: SanitizeOptions<T>
): AsyncGenerator<RawContent<T> | WrappedContent, void, undefined>;
export function sanitizeStream<T extends ExtractedValue = string>(
  source: StreamSource,
  options: SanitizeOptions<T> = {}
): AsyncGenerator<RawContent<T> | WrappedContent, void, undefined> {
  const config = resolveStreamConfig(options);
  return run(source, config);
}

async function* run<T extends ExtractedValue>(
  source: StreamSource,
  config: StreamConfig<T>
): AsyncGenerator<RawContent<T> | WrappedContent, void, undefined> {
  const extractor = new ContentExtractor(config);
  let frameIndex = 0;

  for await (const frame of splitFrames(source, config)) {
    frameIndex++;

    if (isTerminator(frame, config.skipMarkers)) {
      config.logger?.debug({ frameIndex }, 'stream: sentinel reached');
      return;
    }

    const outcome = extractor.extract(frame);
    if (outcome.kind === 'empty') {
      if (outcome.reason === 'malformed') {
        config.logger?.debug({ frameIndex, frame }, 'stream: dropped undecodable frame');
      }
      continue;
    }

    yield config.raw ? outcome.value : wrap(outcome.value);
  }
}

function wrap(value: ExtractedValue): WrappedContent {
  if (typeof value === 'string') return { text: value };
  return value;
}

/**
 * Drain a sanitized stream into one string. Structured values are ignored.
 */
export async function collectText(
  stream: AsyncIterable<ExtractedValue | TextChunk>
): Promise<string> {
  let joined = '';
  for await (const item of stream) {
    if (typeof item === 'string') {
      joined += item;
      continue;
    }
    const text = item['text'];
    if (typeof text === 'string') joined += text;
  }
  return joined;
}
