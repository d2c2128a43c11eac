/**
 * OpenAI-shaped request/response bodies served by the HTTP shim.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  stream?: boolean;
  optimizer?: string;
}

export type FinishReason = 'stop' | null;

export interface ChatChoice {
  index: number;
  message: {
    role: 'assistant';
    content: string;
  };
  finish_reason: FinishReason;
}

export interface ChatStreamChoice {
  index: number;
  delta: {
    role?: 'assistant';
    content?: string;
  };
  finish_reason: FinishReason;
}

export interface UsageInfo {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletion {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: ChatChoice[];
  usage: UsageInfo;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: ChatStreamChoice[];
}

export interface ModelEntry {
  id: string;
  object: 'model';
  owned_by: string;
}
