import { randomBytes } from 'node:crypto';
import { type SanitizeOptions } from '../types/stream.js';
import { ProviderName } from '../types/provider.js';
import { DATA_STREAM_TEXT_RULES } from '../streaming/rules.js';
import { BaseProvider, type ProviderOptions, type ProviderRequest } from './base.js';

const JADVE_URL = 'https://ai-api.jadve.com/api/chat';

export const JADVE_MODELS = ['gpt-5-mini', 'claude-3-5-haiku-20241022'] as const;

/**
 * Jadve chat, speaking the `0:"..."` data stream protocol. Only text parts
 * are kept; usage and tool parts fall through the extract rule.
 */
export class JadveProvider extends BaseProvider {
  constructor(options: ProviderOptions = {}) {
    super(ProviderName.Jadve, options, { model: JADVE_MODELS[0], availableModels: JADVE_MODELS });
  }

  protected override defaultHeaders(): Record<string, string> {
    return {
      ...super.defaultHeaders(),
      accept: '*/*',
      origin: 'https://jadve.com',
      referer: 'https://jadve.com/',
    };
  }

  protected override buildRequest(prompt: string): ProviderRequest {
    return {
      url: JADVE_URL,
      body: {
        id: randomBytes(8).toString('hex'),
        messages: [{ role: 'user', content: [{ type: 'text', text: prompt }] }],
        model: this.model,
        botId: '',
        chatId: '',
        stream: true,
        returnTokensUsage: true,
        useTools: false,
      },
    };
  }

  protected override streamOptions(): SanitizeOptions {
    return { rules: DATA_STREAM_TEXT_RULES, yieldRawOnError: false };
  }
}
