import { type ExtractorFn, type JsonObject, type SanitizeOptions } from '../types/stream.js';
import { ProviderError } from '../types/errors.js';
import { ProviderName } from '../types/provider.js';
import {
  errorMessage,
  errorPayload,
  openAIDeltaContent,
  openAIMessageContent,
} from '../streaming/extractors.js';
import { BaseProvider, type DeltaMapper, type ProviderOptions, type ProviderRequest } from './base.js';

export const DEFAULT_OPENAI_COMPATIBLE_BASE_URL = 'https://api.together.xyz/v1';
export const DEFAULT_OPENAI_COMPATIBLE_MODEL = 'meta-llama/Llama-3.3-70B-Instruct-Turbo-Free';

export interface OpenAICompatibleOptions extends ProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  /** Sent as `max_tokens` */
  maxTokens?: number;
}

type OpenAIValue = string | JsonObject;

const deltaOrError: ExtractorFn<OpenAIValue> = (value) =>
  errorPayload(value) ?? openAIDeltaContent(value);

const messageOrError: ExtractorFn<OpenAIValue> = (value) =>
  errorPayload(value) ?? openAIMessageContent(value);

/**
 * Any `/chat/completions` endpoint speaking the OpenAI wire format
 * (Together, Groq, OpenRouter, local servers...).
 */
export class OpenAICompatibleProvider extends BaseProvider<OpenAIValue> {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly temperature: number | undefined;
  private readonly maxTokens: number | undefined;

  constructor(options: OpenAICompatibleOptions = {}) {
    super(ProviderName.OpenAICompatible, options, { model: DEFAULT_OPENAI_COMPATIBLE_MODEL });
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENAI_COMPATIBLE_BASE_URL).replace(/\/+$/, '');
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  protected override buildRequest(prompt: string, stream: boolean): ProviderRequest {
    const headers: Record<string, string> = {};
    if (this.apiKey) headers['authorization'] = `Bearer ${this.apiKey}`;

    return {
      url: `${this.baseUrl}/chat/completions`,
      headers,
      body: {
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: prompt },
        ],
        stream,
        ...(this.maxTokens !== undefined ? { max_tokens: this.maxTokens } : {}),
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
      },
    };
  }

  protected override streamOptions(stream: boolean): SanitizeOptions<OpenAIValue> {
    if (stream) {
      return {
        introValue: 'data:',
        toJson: true,
        skipMarkers: ['[DONE]'],
        contentExtractor: deltaOrError,
        yieldRawOnError: false,
      };
    }

    return {
      framing: 'buffer',
      toJson: true,
      contentExtractor: messageOrError,
      yieldRawOnError: false,
    };
  }

  protected override createDeltaMapper(): DeltaMapper<OpenAIValue> {
    return (value) => {
      if (typeof value === 'string') return value;
      throw new ProviderError(this.name, 200, {}, errorMessage(value), value);
    };
  }
}
