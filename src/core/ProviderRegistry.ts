import { type ChatProvider, ProviderName } from '../types/provider.js';
import { ConfigurationError } from '../types/errors.js';
import { type ProviderOptions } from '../providers/base.js';
import {
  DEFAULT_OPENAI_COMPATIBLE_MODEL,
  OpenAICompatibleProvider,
} from '../providers/openaiCompatible.js';
import { ZAI_MODELS, ZaiProvider } from '../providers/zai.js';
import { SCIRA_MODELS, SciraProvider } from '../providers/scira.js';
import { JADVE_MODELS, JadveProvider } from '../providers/jadve.js';
import { type Config } from '../config.js';

export type ProviderFactory = (options: ProviderOptions) => ChatProvider;

export interface ProviderEntry {
  create: ProviderFactory;
  /** Models advertised on /v1/models; the first is the default */
  models: readonly string[];
}

export interface ResolvedModel {
  provider: string;
  model: string | undefined;
}

/**
 * Name → factory table. Model specs take the form `provider/model`; a spec
 * without a registered provider prefix is a model of the default provider.
 */
export class ProviderRegistry {
  private readonly entries = new Map<string, ProviderEntry>();

  constructor(
    private readonly defaultProvider: string,
    private readonly sharedOptions: ProviderOptions = {}
  ) {}

  register(name: string, entry: ProviderEntry): this {
    this.entries.set(name, entry);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Every advertised model as a `provider/model` spec */
  modelSpecs(): string[] {
    return [...this.entries].flatMap(([name, entry]) =>
      entry.models.map((model) => `${name}/${model}`)
    );
  }

  parse(spec: string | undefined): ResolvedModel {
    const trimmed = spec?.trim() ?? '';
    if (!trimmed) return { provider: this.defaultProvider, model: undefined };

    const slash = trimmed.indexOf('/');
    if (slash > 0) {
      const prefix = trimmed.slice(0, slash);
      if (this.entries.has(prefix)) {
        const model = trimmed.slice(slash + 1);
        return { provider: prefix, model: model || undefined };
      }
    }

    return { provider: this.defaultProvider, model: trimmed };
  }

  /**
   * Build a fresh provider for one model spec. Per-call options override the
   * registry's shared ones.
   */
  resolve(spec: string | undefined, options: ProviderOptions = {}): ChatProvider {
    const { provider, model } = this.parse(spec);
    const entry = this.entries.get(provider);
    if (!entry) {
      throw new ConfigurationError(
        `Unknown provider "${provider}". Choose from: ${this.names().join(', ')}`
      );
    }

    return entry.create({ ...this.sharedOptions, ...options, model });
  }
}

/**
 * Registry wired from environment configuration.
 */
export function createDefaultRegistry(config: Config): ProviderRegistry {
  const registry = new ProviderRegistry(config.DEFAULT_PROVIDER, {
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    historyOffset: config.HISTORY_OFFSET,
  });

  const openAIModel = config.OPENAI_COMPATIBLE_MODEL ?? DEFAULT_OPENAI_COMPATIBLE_MODEL;

  return registry
    .register(ProviderName.OpenAICompatible, {
      models: [openAIModel],
      create: (options) =>
        new OpenAICompatibleProvider({
          ...options,
          model: options.model ?? openAIModel,
          apiKey: config.OPENAI_COMPATIBLE_API_KEY,
          baseUrl: config.OPENAI_COMPATIBLE_BASE_URL,
          maxTokens: config.MAX_TOKENS,
        }),
    })
    .register(ProviderName.Zai, {
      models: ZAI_MODELS,
      create: (options) => new ZaiProvider({ ...options, apiKey: config.ZAI_API_KEY }),
    })
    .register(ProviderName.Scira, {
      models: SCIRA_MODELS,
      create: (options) => new SciraProvider(options),
    })
    .register(ProviderName.Jadve, {
      models: JADVE_MODELS,
      create: (options) => new JadveProvider(options),
    });
}
