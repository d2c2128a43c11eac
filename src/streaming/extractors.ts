import { type ExtractorFn, type JsonObject, type JsonValue } from '../types/stream.js';

export type JsonPath = ReadonlyArray<string | number>;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Safe nested lookup: any missing key, out-of-range index or type mismatch
 * along the way yields undefined.
 */
export function getPath(value: JsonValue | undefined, path: JsonPath): JsonValue | undefined {
  let current: JsonValue | undefined = value;

  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isJsonObject(current)) return undefined;
      current = current[key];
    }
    if (current === undefined) return undefined;
  }

  return current;
}

/**
 * Extractor returning the string found at `path`, if any.
 */
export function jsonPath(...path: JsonPath): ExtractorFn {
  return (value) => {
    const found = getPath(value, path);
    return typeof found === 'string' ? found : null;
  };
}

// ── OpenAI-shaped payloads ──────────────────────────────────────────────────

/** `choices[0].delta.content` of a chat.completion.chunk */
export const openAIDeltaContent: ExtractorFn = jsonPath('choices', 0, 'delta', 'content');

/** `choices[0].message.content` of a chat.completion body */
export const openAIMessageContent: ExtractorFn = jsonPath('choices', 0, 'message', 'content');

/**
 * In-band error object (`{"error": {...}}` or `{"error": "..."}`) carried by
 * a frame, or null.
 */
export function errorPayload(value: JsonValue): JsonObject | null {
  if (!isJsonObject(value)) return null;
  const error = value['error'];
  if (error === undefined || error === null) return null;
  return value;
}

export function errorMessage(payload: JsonObject): string {
  const error = payload['error'];
  if (typeof error === 'string') return error;
  const message = getPath(error, ['message']);
  return typeof message === 'string' ? message : JSON.stringify(error);
}
