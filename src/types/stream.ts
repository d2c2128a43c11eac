/**
 * Shapes shared by the stream normalization pipeline.
 * Everything here is plain data; behaviour lives under src/streaming.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One piece of a response body as delivered by the transport */
export type RawChunk = string | Uint8Array;

export type StreamSource = RawChunk | Iterable<RawChunk> | AsyncIterable<RawChunk>;

/** Value an extractor may produce for one frame */
export type ExtractedValue = string | JsonObject;

/** Envelope yielded when the caller did not ask for raw values */
export interface TextChunk {
  text: string;
}

export interface Extractor<T extends ExtractedValue = string> {
  extract(value: JsonValue): T | null | undefined;
}

export type ExtractorFn<T extends ExtractedValue = string> = (
  value: JsonValue
) => T | null | undefined;

export type ContentExtractor<T extends ExtractedValue = string> = Extractor<T> | ExtractorFn<T>;

export type RuleAction = 'skip' | 'extract';

export interface StreamRule {
  pattern: string | RegExp;
  action: RuleAction;
}

export type Framing = 'lines' | 'buffer';

export interface StreamLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
}

/**
 * Options accepted by sanitizeStream.
 * Every field is optional; see resolveStreamConfig for defaults.
 */
export interface SanitizeOptions<T extends ExtractedValue = string> {
  /** Literal prefix of a frame line, e.g. "data:" */
  introValue?: string | null;
  toJson?: boolean;
  contentExtractor?: ContentExtractor<T> | null;
  extractRegexes?: ReadonlyArray<string | RegExp>;
  skipRegexes?: ReadonlyArray<string | RegExp>;
  rules?: ReadonlyArray<StreamRule>;
  /** Trimmed frame text equal to one of these ends the stream */
  skipMarkers?: readonly string[];
  yieldRawOnError?: boolean;
  encoding?: string;
  raw?: boolean;
  framing?: Framing;
  lineDelimiter?: string;
  logger?: StreamLogger | null;
}

/** Resolved, frozen configuration for one pipeline run */
export interface StreamConfig<T extends ExtractedValue = string> {
  readonly introValue: string | null;
  readonly toJson: boolean;
  readonly extractor: Extractor<T> | null;
  readonly extractPatterns: readonly RegExp[];
  readonly skipPatterns: readonly RegExp[];
  readonly skipMarkers: readonly string[];
  readonly yieldRawOnError: boolean;
  readonly encoding: string;
  readonly raw: boolean;
  readonly framing: Framing;
  readonly lineDelimiter: string;
  readonly logger: StreamLogger | null;
}

/** What a single frame produced once it went through extraction */
export type FrameOutcome<T extends ExtractedValue = string> =
  | { kind: 'content'; value: T | string }
  | { kind: 'empty'; reason: EmptyReason };

export type EmptyReason = 'blank' | 'skipped' | 'unmatched' | 'malformed' | 'no-content';

/** Values yielded by sanitizeStream in raw mode */
export type RawContent<T extends ExtractedValue> = T | string;

/** Values yielded by sanitizeStream in envelope mode */
export type WrappedContent = TextChunk | JsonObject;
