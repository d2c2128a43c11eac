import { type TextChunk } from './stream.js';

export enum ProviderName {
  OpenAICompatible = 'openai-compatible',
  Zai = 'zai',
  Scira = 'scira',
  Jadve = 'jadve',
}

export interface ChatCallOptions {
  stream?: boolean;
  optimizer?: string;
  conversationally?: boolean;
  signal?: AbortSignal;
}

/**
 * Public surface every provider exposes, independent of the value type its
 * extractor produces internally.
 */
export interface ChatProvider {
  readonly name: string;
  readonly model: string;
  lastResponse: TextChunk;
  chat(prompt: string, options: ChatCallOptions & { stream: true }): AsyncGenerator<string, void, undefined>;
  chat(prompt: string, options?: ChatCallOptions & { stream?: false }): Promise<string>;
  chat(prompt: string, options?: ChatCallOptions): AsyncGenerator<string, void, undefined> | Promise<string>;
  getMessage(response: TextChunk): string;
}
