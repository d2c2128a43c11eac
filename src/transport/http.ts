import { request as undiciRequest, ProxyAgent, type Dispatcher } from 'undici';
import { normalizeHeaders } from '../utils/headers.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface TransportRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialized as JSON when not already a string */
  body?: unknown;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: AsyncIterable<Uint8Array>;
  /** Reads the whole remaining body; use either this or `body`, not both */
  text(): Promise<string>;
}

/**
 * HTTP collaborator used by providers. Timeouts are enforced here; the
 * stream pipeline never polls or times out on its own.
 */
export interface Transport {
  send(req: TransportRequest): Promise<TransportResponse>;
}

export interface UndiciTransportOptions {
  /** Proxy URL, e.g. http://127.0.0.1:8080 */
  proxy?: string;
  timeoutMs?: number;
}

export class UndiciTransport implements Transport {
  private readonly dispatcher: Dispatcher | undefined;
  private readonly timeoutMs: number;

  constructor(options: UndiciTransportOptions = {}) {
    this.dispatcher = options.proxy ? new ProxyAgent(options.proxy) : undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    const timeout = req.timeoutMs ?? this.timeoutMs;

    const response = await undiciRequest(req.url, {
      method: req.method ?? 'POST',
      headers: req.headers,
      body: serializeBody(req.body),
      signal: req.signal,
      headersTimeout: timeout,
      bodyTimeout: timeout,
      dispatcher: this.dispatcher,
    });

    const body = response.body;

    return {
      status: response.statusCode,
      headers: normalizeHeaders(response.headers),
      body: bytesOf(body),
      text: () => body.text(),
    };
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}

function serializeBody(body: unknown): string | undefined {
  if (body === undefined || body === null) return undefined;
  if (typeof body === 'string') return body;
  return JSON.stringify(body);
}

async function* bytesOf(body: AsyncIterable<Buffer>): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const chunk of body) {
    yield chunk;
  }
}
