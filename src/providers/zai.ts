import { randomUUID } from 'node:crypto';
import { type SanitizeOptions } from '../types/stream.js';
import { ProviderName } from '../types/provider.js';
import { HTML_WRAPPER_RULES, jsonFieldRules } from '../streaming/rules.js';
import { BaseProvider, type ProviderOptions, type ProviderRequest } from './base.js';

const ZAI_BASE_URL = 'https://chat.z.ai';

export const ZAI_MODELS = ['0727-106B-API', '0727-360B-API'] as const;

export interface ZaiOptions extends ProviderOptions {
  /** Bearer token obtained by the caller; session negotiation is not handled here */
  apiKey?: string;
  enableThinking?: boolean;
}

/**
 * Z.AI chat. Frames are JSON, but only the escaped `delta_content` /
 * `edit_content` strings matter; wrapper markup (reasoning <details>
 * blocks, stray tags) is skipped by rule.
 */
export class ZaiProvider extends BaseProvider {
  private readonly apiKey: string | undefined;
  private readonly enableThinking: boolean;

  constructor(options: ZaiOptions = {}) {
    super(ProviderName.Zai, options, { model: ZAI_MODELS[0], availableModels: ZAI_MODELS });
    this.apiKey = options.apiKey;
    this.enableThinking = options.enableThinking ?? true;
  }

  protected override defaultHeaders(): Record<string, string> {
    return {
      ...super.defaultHeaders(),
      accept: 'text/event-stream',
      'app-name': 'chatglm',
      origin: ZAI_BASE_URL,
      'x-app-platform': 'pc',
    };
  }

  protected override buildRequest(prompt: string): ProviderRequest {
    const headers: Record<string, string> = {};
    if (this.apiKey) headers['authorization'] = `Bearer ${this.apiKey}`;

    return {
      url: `${ZAI_BASE_URL}/api/chat/completions`,
      headers,
      body: {
        stream: true,
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        params: {},
        features: {
          image_generation: false,
          web_search: false,
          auto_web_search: false,
          preview_mode: true,
          enable_thinking: this.enableThinking,
        },
        actions: [],
        tags: [],
        chat_id: 'local',
        id: randomUUID(),
      },
    };
  }

  protected override streamOptions(): SanitizeOptions {
    return {
      introValue: 'data:',
      toJson: true,
      rules: [...HTML_WRAPPER_RULES, ...jsonFieldRules('delta_content', 'edit_content')],
      yieldRawOnError: false,
    };
  }
}
