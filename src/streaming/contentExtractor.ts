import {
  type EmptyReason,
  type ExtractedValue,
  type FrameOutcome,
  type JsonValue,
  type StreamConfig,
} from '../types/stream.js';
import { decodeFrame } from './frameDecoder.js';
import { decodeEscapes } from './escapes.js';

/**
 * Derives the visible content of one frame.
 *
 * Precedence is fixed: skip patterns, then extract patterns, then the
 * extractor function, then pass-through of string values.
 */
export class ContentExtractor<T extends ExtractedValue = string> {
  constructor(private readonly config: StreamConfig<T>) {}

  extract(text: string): FrameOutcome<T> {
    if (text.trim() === '') return empty('blank');

    if (this.config.skipPatterns.some((pattern) => pattern.test(text))) {
      return empty('skipped');
    }

    if (this.config.extractPatterns.length > 0) {
      return this.extractByPattern(text);
    }

    const decoded = decodeFrame(text, this.config);
    switch (decoded.kind) {
      case 'dropped':
        return empty(decoded.reason);
      case 'raw':
        return { kind: 'content', value: decoded.text };
      case 'value':
        return this.extractValue(decoded.value);
    }
  }

  private extractByPattern(text: string): FrameOutcome<T> {
    for (const pattern of this.config.extractPatterns) {
      const match = pattern.exec(text);
      if (!match) continue;

      const captured = match.length > 1 ? match[1] : match[0];
      return content(decodeEscapes(captured ?? ''));
    }
    return empty('unmatched');
  }

  private extractValue(value: JsonValue): FrameOutcome<T> {
    if (this.config.extractor) {
      const extracted = this.config.extractor.extract(value);
      if (extracted === null || extracted === undefined || extracted === '') {
        return empty('no-content');
      }
      return { kind: 'content', value: extracted };
    }

    if (typeof value === 'string') return content(value);
    if (typeof value === 'number' || typeof value === 'boolean') return content(String(value));

    // No rule says how to flatten a structured value into text
    return empty('no-content');
  }
}

function content<T extends ExtractedValue>(value: string): FrameOutcome<T> {
  if (value === '') return empty('no-content');
  return { kind: 'content', value };
}

function empty<T extends ExtractedValue>(reason: EmptyReason): FrameOutcome<T> {
  return { kind: 'empty', reason };
}
