import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { type ProviderRegistry } from '../core/ProviderRegistry.js';
import { Conversation } from '../core/Conversation.js';
import { type ProviderOptions } from '../providers/base.js';
import { type ChatProvider } from '../types/provider.js';
import { type ChatMessage } from '../types/request.js';
import {
  ConfigurationError,
  FailedToGenerateResponseError,
  describeError,
} from '../types/errors.js';
import {
  DONE_FRAME,
  buildChatCompletion,
  generateCompletionId,
  sseFrame,
  toOpenAIStream,
} from '../streaming/openaiOutput.js';
import { type AuthMiddleware } from '../middleware/auth.js';
import { requestIdMiddleware } from '../middleware/requestId.js';

const chatRequestSchema = z.object({
  model: z.string().optional(),
  messages: z
    .array(
      z.object({
        role: z.enum(['system', 'user', 'assistant']),
        content: z.string(),
      })
    )
    .min(1, 'messages must contain at least one message'),
  stream: z.boolean().optional(),
  optimizer: z.string().optional(),
});

export interface PreparedChat {
  prompt: string;
  options: ProviderOptions;
}

export interface ChatRouteOptions {
  /** Applied to the per-request conversation */
  historyOffset?: number;
}

/**
 * Turn an OpenAI message list into one prompt plus the conversation that
 * carries the earlier turns. The shim itself is stateless: every request
 * gets its own transcript.
 *
 * System messages become the conversation intro, which every provider sends;
 * they are not also passed as `systemPrompt`.
 */
export function prepareChat(
  messages: ChatMessage[],
  settings: ChatRouteOptions = {}
): PreparedChat | null {
  const last = messages[messages.length - 1];
  if (!last || last.role !== 'user') return null;

  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n');
  const turns = messages.slice(0, -1).filter((m) => m.role !== 'system');

  if (turns.length === 0 && !system) {
    return { prompt: last.content, options: { isConversation: false } };
  }

  const conversation = new Conversation({
    historyOffset: settings.historyOffset,
    ...(system ? { intro: system } : {}),
  });
  let pendingUser: string | null = null;
  for (const turn of turns) {
    if (turn.role === 'user') {
      if (pendingUser !== null) conversation.updateChatHistory(pendingUser, '');
      pendingUser = turn.content;
    } else {
      conversation.updateChatHistory(pendingUser ?? '', turn.content);
      pendingUser = null;
    }
  }
  if (pendingUser !== null) conversation.updateChatHistory(pendingUser, '');

  return { prompt: last.content, options: { conversation } };
}

function errorBody(message: string, type: string, code: string) {
  return { error: { message, type, code } };
}

// yield* forwards return() so an early stop still closes the provider stream
async function* prepend<T>(first: T, rest: AsyncIterable<T>): AsyncGenerator<T, void, undefined> {
  yield first;
  yield* rest;
}

export function createChatRoutes(
  registry: ProviderRegistry,
  authMiddleware: AuthMiddleware,
  settings: ChatRouteOptions = {}
) {
  return async function chatRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.post(
      '/v1/chat/completions',
      {
        preHandler: [requestIdMiddleware, authMiddleware],
      },
      async (request: FastifyRequest, reply: FastifyReply) => {
        const parsed = chatRequestSchema.safeParse(request.body);
        if (!parsed.success) {
          const message = parsed.error.errors
            .map((e) => `${e.path.join('.') || 'body'}: ${e.message}`)
            .join('; ');
          return reply.status(400).send(errorBody(message, 'invalid_request_error', 'invalid_body'));
        }

        const body = parsed.data;
        const prepared = prepareChat(body.messages, settings);
        if (!prepared) {
          return reply
            .status(400)
            .send(
              errorBody('The last message must have role "user"', 'invalid_request_error', 'invalid_messages')
            );
        }

        const controller = new AbortController();

        // Abort the upstream call when the client disconnects
        request.raw.on('close', () => {
          if (!request.raw.complete) {
            controller.abort();
          }
        });

        const callOptions = { optimizer: body.optimizer, signal: controller.signal };
        const completionId = generateCompletionId();

        try {
          const provider: ChatProvider = registry.resolve(body.model, prepared.options);
          const responseModel = `${provider.name}/${provider.model}`;

          if (!body.stream) {
            const text = await provider.chat(prepared.prompt, { ...callOptions, stream: false });
            return reply.status(200).send(buildChatCompletion(text, completionId, responseModel));
          }

          const deltas = provider.chat(prepared.prompt, { ...callOptions, stream: true });
          // Pull the first delta before committing to a 200 so upstream
          // failures still get a proper status code
          const first = await deltas.next();
          const source = first.done ? deltas : prepend(first.value, deltas);

          reply.raw.setHeader('Content-Type', 'text/event-stream');
          reply.raw.setHeader('Cache-Control', 'no-cache');
          reply.raw.setHeader('Connection', 'keep-alive');
          reply.raw.setHeader('X-Accel-Buffering', 'no');
          reply.raw.setHeader('x-request-id', request.requestId);
          reply.hijack();

          try {
            for await (const frame of toOpenAIStream(source, completionId, responseModel)) {
              if (reply.raw.destroyed) break;
              reply.raw.write(frame);
            }
          } catch (err) {
            request.log.warn({ err: describeError(err) }, 'stream failed after headers were sent');
            if (!reply.raw.destroyed) {
              const message = err instanceof Error ? err.message : 'stream failed';
              reply.raw.write(sseFrame(errorBody(message, 'api_error', 'provider_error')));
              reply.raw.write(DONE_FRAME);
            }
          }

          reply.raw.end();
          return reply;
        } catch (err) {
          if (controller.signal.aborted) {
            return reply
              .status(499)
              .send(errorBody('Request cancelled by client', 'request_cancelled', 'client_closed_request'));
          }

          if (err instanceof ConfigurationError) {
            return reply.status(400).send(errorBody(err.message, 'invalid_request_error', 'invalid_request'));
          }

          if (err instanceof FailedToGenerateResponseError) {
            request.log.warn({ err: err.message, provider: err.provider }, 'provider failed');
            return reply.status(502).send(errorBody(err.message, 'api_error', 'provider_error'));
          }

          throw err;
        }
      }
    );
  };
}
