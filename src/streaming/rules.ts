import { type StreamRule } from '../types/stream.js';
import { ConfigurationError } from '../types/errors.js';

export interface CompiledRules {
  skip: RegExp[];
  extract: RegExp[];
}

/**
 * Compile a pattern given as a string (or pass a RegExp through).
 * Stateful flags are dropped so the same pattern can be tested against many frames.
 */
export function compilePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    if (!pattern.global && !pattern.sticky) return pattern;
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }

  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new ConfigurationError(`Invalid stream pattern: ${pattern}`, { cause: err });
  }
}

/**
 * Split a rule table into ordered skip and extract pattern lists.
 */
export function compileRules(rules: ReadonlyArray<StreamRule>): CompiledRules {
  const compiled: CompiledRules = { skip: [], extract: [] };
  for (const rule of rules) {
    compiled[rule.action].push(compilePattern(rule.pattern));
  }
  return compiled;
}

// ── Shared rule tables ──────────────────────────────────────────────────────

/** Drop HTML/XML wrapper tags and blank frames before content logic runs */
export const HTML_WRAPPER_RULES: readonly StreamRule[] = [
  { pattern: /<details[^>]*>.*?<\/details>/, action: 'skip' },
  { pattern: /<summary>.*?<\/summary>/, action: 'skip' },
  { pattern: /<[^>]+>/, action: 'skip' },
  { pattern: /^\s*$/, action: 'skip' },
];

/** Text parts of the `0:"..."` data stream protocol */
export const DATA_STREAM_TEXT_RULES: readonly StreamRule[] = [
  { pattern: /0:"(.*?)"(?=,|$)/, action: 'extract' },
];

/** Escaped JSON string fields carrying incremental text */
export function jsonFieldRules(...fields: string[]): StreamRule[] {
  return fields.map((field) => ({
    pattern: new RegExp(`"${field}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`),
    action: 'extract' as const,
  }));
}
