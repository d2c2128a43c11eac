import { randomUUID } from 'node:crypto';
import {
  type ChatCompletion,
  type ChatCompletionChunk,
  type ChatStreamChoice,
} from '../types/request.js';

export const DONE_FRAME = 'data: [DONE]\n\n';

export function sseFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Re-encode plain text deltas as OpenAI `chat.completion.chunk` SSE frames.
 *
 * Output:
 *   data: {"object":"chat.completion.chunk","choices":[{"delta":{"role":"assistant"}...}]}
 *   data: {"object":"chat.completion.chunk","choices":[{"delta":{"content":"Hel"}...}]}
 *   data: {"object":"chat.completion.chunk","choices":[{"delta":{},"finish_reason":"stop"}]}
 *   data: [DONE]
 *
 * Errors from the delta source propagate; the caller decides how to report
 * them on an already-open stream.
 */
export async function* toOpenAIStream(
  deltas: AsyncIterable<string>,
  id: string,
  model: string,
  created: number = nowSeconds()
): AsyncGenerator<string, void, undefined> {
  const chunk = (choice: ChatStreamChoice): ChatCompletionChunk => ({
    id,
    object: 'chat.completion.chunk',
    created,
    model,
    choices: [choice],
  });

  yield sseFrame(chunk({ index: 0, delta: { role: 'assistant' }, finish_reason: null }));

  for await (const content of deltas) {
    if (!content) continue;
    yield sseFrame(chunk({ index: 0, delta: { content }, finish_reason: null }));
  }

  yield sseFrame(chunk({ index: 0, delta: {}, finish_reason: 'stop' }));
  yield DONE_FRAME;
}

export function buildChatCompletion(
  content: string,
  id: string,
  model: string,
  created: number = nowSeconds()
): ChatCompletion {
  return {
    id,
    object: 'chat.completion',
    created,
    model,
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    // Upstreams behind this shim do not report usage
    usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
  };
}

/**
 * Generate a completion ID in OpenAI format (chatcmpl- prefix)
 */
export function generateCompletionId(): string {
  return `chatcmpl-${randomUUID().replace(/-/g, '').slice(0, 24)}`;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
