import {
  type ContentExtractor,
  type ExtractedValue,
  type Extractor,
  type SanitizeOptions,
  type StreamConfig,
} from '../types/stream.js';
import { ConfigurationError } from '../types/errors.js';
import { compilePattern, compileRules } from './rules.js';

export const DEFAULT_ENCODING = 'utf-8';
export const DEFAULT_LINE_DELIMITER = '\n';

/**
 * Validate and freeze the options of one sanitizeStream call.
 * Throws ConfigurationError for programmer mistakes; never looks at stream data.
 */
export function resolveStreamConfig<T extends ExtractedValue>(
  options: SanitizeOptions<T> = {}
): StreamConfig<T> {
  const introValue = options.introValue ?? null;
  if (introValue === '') {
    throw new ConfigurationError('introValue must be a non-empty string or null');
  }

  const lineDelimiter = options.lineDelimiter ?? DEFAULT_LINE_DELIMITER;
  if (lineDelimiter === '') {
    throw new ConfigurationError('lineDelimiter must not be empty');
  }

  const encoding = options.encoding ?? DEFAULT_ENCODING;
  assertEncoding(encoding);

  const fromRules = compileRules(options.rules ?? []);

  return Object.freeze({
    introValue,
    toJson: options.toJson ?? false,
    extractor: toExtractor(options.contentExtractor),
    extractPatterns: Object.freeze([
      ...(options.extractRegexes ?? []).map(compilePattern),
      ...fromRules.extract,
    ]),
    skipPatterns: Object.freeze([
      ...(options.skipRegexes ?? []).map(compilePattern),
      ...fromRules.skip,
    ]),
    skipMarkers: Object.freeze([...(options.skipMarkers ?? [])]),
    yieldRawOnError: options.yieldRawOnError ?? false,
    encoding,
    raw: options.raw ?? false,
    framing: options.framing ?? 'lines',
    lineDelimiter,
    logger: options.logger ?? null,
  });
}

function toExtractor<T extends ExtractedValue>(
  extractor: ContentExtractor<T> | null | undefined
): Extractor<T> | null {
  if (!extractor) return null;
  if (typeof extractor === 'function') return { extract: extractor };
  return extractor;
}

function assertEncoding(encoding: string): void {
  try {
    new TextDecoder(encoding);
  } catch (err) {
    throw new ConfigurationError(`Unsupported encoding: ${encoding}`, { cause: err });
  }
}
