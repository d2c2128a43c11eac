import { randomUUID } from 'node:crypto';
import { type ExtractorFn, type JsonObject, type SanitizeOptions } from '../types/stream.js';
import { ProviderError } from '../types/errors.js';
import { ProviderName } from '../types/provider.js';
import { isJsonObject } from '../streaming/extractors.js';
import { BaseProvider, type DeltaMapper, type ProviderOptions, type ProviderRequest } from './base.js';

const SCIRA_URL = 'https://scira.ai/api/search';

/** Public model names and the identifiers the search API expects */
export const SCIRA_MODEL_ALIASES: Readonly<Record<string, string>> = {
  'grok-3-mini': 'scira-default',
  'llama-4-maverick': 'scira-llama-4',
  'qwen3-4b': 'scira-qwen-4b',
  'qwen3-32b': 'scira-qwen-32b',
  'qwen3-4b-thinking': 'scira-qwen-4b-thinking',
};

export const SCIRA_MODELS: readonly string[] = [
  ...Object.keys(SCIRA_MODEL_ALIASES),
  ...Object.values(SCIRA_MODEL_ALIASES),
];

export function resolveSciraModel(model: string): string {
  return SCIRA_MODEL_ALIASES[model] ?? model;
}

export interface SciraOptions extends ProviderOptions {
  searchMode?: string;
  timezone?: string;
  userId?: string;
}

const sciraEvent: ExtractorFn<JsonObject> = (value) =>
  isJsonObject(value) && typeof value['type'] === 'string' ? value : null;

function stringField(event: JsonObject, key: string): string {
  const value = event[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Scira search chat. The body is a stream of typed events; reasoning
 * events are folded into the transcript inside a <think> block.
 */
export class SciraProvider extends BaseProvider<JsonObject> {
  private readonly chatId = randomUUID();
  private readonly userId: string;
  private readonly searchMode: string;
  private readonly timezone: string;

  constructor(options: SciraOptions = {}) {
    super(ProviderName.Scira, options, { model: 'grok-3-mini', availableModels: SCIRA_MODELS });
    this.searchMode = options.searchMode ?? 'chat';
    this.timezone = options.timezone ?? 'UTC';
    this.userId = options.userId ?? `user_${randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
  }

  protected override buildRequest(prompt: string): ProviderRequest {
    return {
      url: SCIRA_URL,
      headers: { origin: 'https://scira.ai', referer: 'https://scira.ai/' },
      body: {
        id: this.chatId,
        messages: [
          {
            role: 'user',
            content: prompt,
            parts: [{ type: 'text', text: prompt }],
            id: randomUUID().slice(0, 16),
          },
        ],
        model: resolveSciraModel(this.model),
        group: this.searchMode,
        user_id: this.userId,
        timezone: this.timezone,
        isCustomInstructionsEnabled: false,
        searchProvider: 'parallel',
      },
    };
  }

  // The endpoint only streams; non-stream calls aggregate the same events
  protected override streamOptions(): SanitizeOptions<JsonObject> {
    return {
      introValue: 'data:',
      toJson: true,
      skipMarkers: ['[DONE]'],
      contentExtractor: sciraEvent,
      yieldRawOnError: false,
    };
  }

  protected override createDeltaMapper(): DeltaMapper<JsonObject> {
    let inThink = false;

    return (event) => {
      if (typeof event === 'string') return null;

      switch (event['type']) {
        case 'reasoning-start':
          if (inThink) return null;
          inThink = true;
          return '<think>\n\n';
        case 'reasoning-delta':
          return inThink ? stringField(event, 'delta') : null;
        case 'reasoning-end':
          if (!inThink) return null;
          inThink = false;
          return '</think>\n\n';
        case 'text-delta':
          return stringField(event, 'delta');
        case 'error':
          throw new ProviderError(this.name, 200, {}, stringField(event, 'errorText') || 'stream error', event);
        default:
          return null;
      }
    };
  }
}
