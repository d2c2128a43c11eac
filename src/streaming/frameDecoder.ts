import { type JsonValue } from '../types/stream.js';

export interface FrameDecoderOptions {
  toJson: boolean;
  yieldRawOnError: boolean;
}

export type DecodedFrame =
  | { kind: 'value'; value: JsonValue }
  | { kind: 'raw'; text: string }
  | { kind: 'dropped'; reason: 'blank' | 'malformed' };

/**
 * True when the trimmed frame text is one of the configured sentinels.
 * A sentinel ends the stream; it is never content.
 */
export function isTerminator(text: string, markers: readonly string[]): boolean {
  if (markers.length === 0) return false;
  return markers.includes(text.trim());
}

/**
 * Turn one frame's text into a value. Never throws on bad input:
 * undecodable JSON is either handed back verbatim or dropped.
 */
export function decodeFrame(text: string, options: FrameDecoderOptions): DecodedFrame {
  if (text.trim() === '') return { kind: 'dropped', reason: 'blank' };
  if (!options.toJson) return { kind: 'value', value: text };

  const parsed = parseJson(text);
  if (parsed.ok) return { kind: 'value', value: parsed.value };

  if (options.yieldRawOnError) return { kind: 'raw', text };
  return { kind: 'dropped', reason: 'malformed' };
}

type ParseResult = { ok: true; value: JsonValue } | { ok: false };

function parseJson(text: string): ParseResult {
  const attempt = tryParse(text);
  if (attempt.ok) return attempt;

  // Rows of a streamed JSON array arrive as `{...},`
  const trimmed = text.trimEnd();
  if (trimmed.endsWith(',')) return tryParse(trimmed.slice(0, -1));

  return attempt;
}

function tryParse(text: string): ParseResult {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
