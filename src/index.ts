export type {
  ContentExtractor,
  EmptyReason,
  ExtractedValue,
  Extractor,
  ExtractorFn,
  FrameOutcome,
  Framing,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RawChunk,
  RawContent,
  RuleAction,
  SanitizeOptions,
  StreamConfig,
  StreamLogger,
  StreamRule,
  StreamSource,
  TextChunk,
  WrappedContent,
} from './types/stream.js';
export {
  ConfigurationError,
  FailedToGenerateResponseError,
  ProviderError,
} from './types/errors.js';

export { sanitizeStream, collectText } from './streaming/sanitize.js';
export { resolveStreamConfig } from './streaming/config.js';
export { FrameSplitter, splitFrames } from './streaming/frameSplitter.js';
export { decodeFrame, isTerminator } from './streaming/frameDecoder.js';
export { ContentExtractor as FrameContentExtractor } from './streaming/contentExtractor.js';
export { decodeEscapes } from './streaming/escapes.js';
export {
  DATA_STREAM_TEXT_RULES,
  HTML_WRAPPER_RULES,
  compilePattern,
  compileRules,
  jsonFieldRules,
} from './streaming/rules.js';
export {
  errorMessage,
  errorPayload,
  getPath,
  jsonPath,
  openAIDeltaContent,
  openAIMessageContent,
} from './streaming/extractors.js';

export { Conversation, type ConversationOptions, type ConversationStore } from './core/Conversation.js';
export { OptimizerRegistry, type Optimizer } from './core/optimizers.js';
export { ProviderRegistry, createDefaultRegistry } from './core/ProviderRegistry.js';

export {
  BaseProvider,
  type AskOptions,
  type ChatOptions,
  type ProviderOptions,
} from './providers/base.js';
export { OpenAICompatibleProvider } from './providers/openaiCompatible.js';
export { ZaiProvider } from './providers/zai.js';
export { SciraProvider } from './providers/scira.js';
export { JadveProvider } from './providers/jadve.js';
export { ProviderName, type ChatProvider } from './types/provider.js';

export { UndiciTransport, type Transport, type TransportRequest, type TransportResponse } from './transport/http.js';
