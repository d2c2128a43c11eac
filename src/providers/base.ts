import { type ExtractedValue, type SanitizeOptions, type TextChunk } from '../types/stream.js';
import {
  ConfigurationError,
  FailedToGenerateResponseError,
  ProviderError,
  describeError,
} from '../types/errors.js';
import { sanitizeStream } from '../streaming/sanitize.js';
import { type Transport, type TransportResponse, UndiciTransport } from '../transport/http.js';
import { Conversation, type ConversationStore } from '../core/Conversation.js';
import { OptimizerRegistry } from '../core/optimizers.js';
import { mergeHeaders } from '../utils/headers.js';
import { createLogger, type Logger } from '../logger.js';
import { type ChatProvider } from '../types/provider.js';

export interface ProviderOptions {
  model?: string;
  systemPrompt?: string;
  timeoutMs?: number;
  /** Proxy URL for the default transport */
  proxy?: string;
  isConversation?: boolean;
  intro?: string;
  historyOffset?: number;
  conversation?: ConversationStore;
  transport?: Transport;
  optimizers?: OptimizerRegistry;
  logger?: Logger;
}

export interface ProviderDefaults {
  model: string;
  /** When set, the model option must be one of these */
  availableModels?: readonly string[];
}

export interface ProviderRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

export interface AskOptions {
  stream?: boolean;
  raw?: boolean;
  /** Name of a registered optimizer */
  optimizer?: string;
  /** Optimize the whole conversation prompt instead of the bare prompt */
  conversationally?: boolean;
  signal?: AbortSignal;
}

export type ChatOptions = Omit<AskOptions, 'raw'>;

/**
 * Maps one extracted value to the text delta forwarded to the caller.
 * A fresh mapper is created per call, so it may keep state across frames.
 */
export type DeltaMapper<T extends ExtractedValue> = (value: T | string) => string | null;

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

/**
 * Shared request/stream/history cycle of every provider.
 *
 * Subclasses describe the upstream call (buildRequest) and how its body is
 * framed and extracted (streamOptions); this class drives the pipeline,
 * accumulates the transcript and commits it to the conversation exactly once
 * per call, even when the consumer stops early or the stream fails.
 */
export abstract class BaseProvider<T extends ExtractedValue = string> implements ChatProvider {
  readonly model: string;
  readonly systemPrompt: string;
  readonly conversation: ConversationStore;
  lastResponse: TextChunk = { text: '' };

  protected readonly transport: Transport;
  protected readonly optimizers: OptimizerRegistry;
  protected readonly logger: Logger;
  protected readonly timeoutMs: number | undefined;

  protected constructor(
    readonly name: string,
    options: ProviderOptions,
    defaults: ProviderDefaults
  ) {
    const model = options.model ?? defaults.model;
    if (defaults.availableModels && !defaults.availableModels.includes(model)) {
      throw new ConfigurationError(
        `Invalid model "${model}" for ${name}. Choose from: ${defaults.availableModels.join(', ')}`
      );
    }

    this.model = model;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.timeoutMs = options.timeoutMs;
    this.transport =
      options.transport ??
      new UndiciTransport({ proxy: options.proxy, timeoutMs: options.timeoutMs });
    this.conversation =
      options.conversation ??
      new Conversation({
        enabled: options.isConversation ?? true,
        intro: options.intro,
        historyOffset: options.historyOffset,
      });
    this.optimizers = options.optimizers ?? new OptimizerRegistry();
    this.logger = options.logger ?? createLogger(`provider:${name}`);
  }

  /** Describe the upstream HTTP call for an already-prepared prompt */
  protected abstract buildRequest(prompt: string, stream: boolean): ProviderRequest;

  /** Framing and extraction rules for the upstream body */
  protected abstract streamOptions(stream: boolean): SanitizeOptions<T>;

  protected createDeltaMapper(): DeltaMapper<T> {
    return (value) => (typeof value === 'string' ? value : null);
  }

  protected defaultHeaders(): Record<string, string> {
    return {
      'content-type': 'application/json',
      accept: 'text/event-stream, application/json',
    };
  }

  // ── Public surface ──────────────────────────────────────────────────────

  ask(prompt: string, options: AskOptions & { stream: true; raw: true }): AsyncGenerator<string, void, undefined>;
  ask(prompt: string, options: AskOptions & { stream: true; raw?: false }): AsyncGenerator<TextChunk, void, undefined>;
  ask(prompt: string, options: AskOptions & { stream?: false; raw: true }): Promise<string>;
  ask(prompt: string, options?: AskOptions & { stream?: false; raw?: false }): Promise<TextChunk>;
  ask(
    prompt: string,
    options?: AskOptions
  ): AsyncGenerator<string | TextChunk, void, undefined> | Promise<string | TextChunk>;
  ask(
    prompt: string,
    options: AskOptions = {}
  ): AsyncGenerator<string | TextChunk, void, undefined> | Promise<string | TextChunk> {
    if (options.stream) {
      // Validated eagerly: the generator body would only run on first next()
      const conversationPrompt = this.preparePrompt(prompt, options);
      const deltas = this.generate(prompt, conversationPrompt, true, options.signal);
      return options.raw ? deltas : toTextChunks(deltas);
    }

    const text = this.complete(prompt, options);
    return options.raw ? text : text.then((value) => ({ text: value }));
  }

  chat(prompt: string, options: ChatOptions & { stream: true }): AsyncGenerator<string, void, undefined>;
  chat(prompt: string, options?: ChatOptions & { stream?: false }): Promise<string>;
  chat(prompt: string, options?: ChatOptions): AsyncGenerator<string, void, undefined> | Promise<string>;
  chat(
    prompt: string,
    options: ChatOptions = {}
  ): AsyncGenerator<string, void, undefined> | Promise<string> {
    if (options.stream) {
      return this.ask(prompt, { ...options, stream: true, raw: true });
    }
    return this.ask(prompt, { ...options, stream: false, raw: true });
  }

  getMessage(response: TextChunk): string {
    return response.text;
  }

  // ── Pipeline ────────────────────────────────────────────────────────────

  private preparePrompt(prompt: string, options: AskOptions): string {
    const conversationPrompt = this.conversation.genCompletePrompt(prompt);
    if (!options.optimizer) return conversationPrompt;

    return this.optimizers.apply(
      options.optimizer,
      options.conversationally ? conversationPrompt : prompt
    );
  }

  private async complete(prompt: string, options: AskOptions): Promise<string> {
    const conversationPrompt = this.preparePrompt(prompt, options);

    let text = '';
    for await (const delta of this.generate(prompt, conversationPrompt, false, options.signal)) {
      text += delta;
    }

    this.lastResponse = { text };
    return text;
  }

  private async *generate(
    prompt: string,
    conversationPrompt: string,
    stream: boolean,
    signal: AbortSignal | undefined
  ): AsyncGenerator<string, void, undefined> {
    let streamingText = '';

    try {
      const response = await this.send(this.buildRequest(conversationPrompt, stream), signal);
      const toDelta = this.createDeltaMapper();
      const values = sanitizeStream<T>(response.body, {
        ...this.streamOptions(stream),
        raw: true,
        logger: this.logger,
      });

      for await (const value of values) {
        const delta = toDelta(value);
        if (!delta) continue;
        streamingText += delta;
        yield delta;
      }
    } catch (err) {
      throw this.wrapError(err);
    } finally {
      if (streamingText) {
        this.lastResponse = { text: streamingText };
        this.conversation.updateChatHistory(prompt, streamingText);
      }
    }
  }

  protected async send(
    request: ProviderRequest,
    signal: AbortSignal | undefined
  ): Promise<TransportResponse> {
    this.logger.debug({ url: request.url, model: this.model }, 'request sent');

    const response = await this.transport.send({
      ...request,
      headers: mergeHeaders(this.defaultHeaders(), request.headers),
      timeoutMs: this.timeoutMs,
      signal,
    });

    if (response.status < 200 || response.status >= 300) {
      const errorBody = await response.text().catch(() => '');
      throw new ProviderError(
        this.name,
        response.status,
        response.headers,
        `${this.name} API error: ${response.status}`,
        errorBody
      );
    }

    return response;
  }

  private wrapError(err: unknown): Error {
    if (err instanceof FailedToGenerateResponseError || err instanceof ConfigurationError) {
      return err;
    }

    this.logger.warn({ err: describeError(err), model: this.model }, 'request failed');

    const detail =
      err instanceof ProviderError && typeof err.body === 'string' && err.body
        ? ` - ${err.body}`
        : '';
    return new FailedToGenerateResponseError(
      this.name,
      `Request failed (${describeError(err)})${detail}`,
      { cause: err }
    );
  }
}

async function* toTextChunks(
  deltas: AsyncGenerator<string, void, undefined>
): AsyncGenerator<TextChunk, void, undefined> {
  for await (const text of deltas) {
    yield { text };
  }
}
