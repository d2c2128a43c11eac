import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UndiciTransport } from '../../src/transport/http.js';
import { collect } from '../fixtures/streams.js';

vi.mock('undici', () => ({
  request: vi.fn(),
  ProxyAgent: vi.fn().mockImplementation(function proxyAgent() {
    return { close: vi.fn().mockResolvedValue(undefined) };
  }),
}));

async function* bodyOf(...parts: string[]) {
  for (const part of parts) yield Buffer.from(part);
}

describe('UndiciTransport', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('serializes the body and applies the timeout to headers and body', async () => {
    const { request } = await import('undici');
    const body = Object.assign(bodyOf('a', 'b'), { text: vi.fn() });
    vi.mocked(request).mockResolvedValue({
      statusCode: 200,
      headers: { 'Content-Type': 'text/event-stream', 'X-Multi': ['1', '2'] },
      body,
    } as unknown as Awaited<ReturnType<typeof request>>);

    const transport = new UndiciTransport({ timeoutMs: 1234 });
    const response = await transport.send({
      url: 'https://upstream.test/chat',
      headers: { 'content-type': 'application/json' },
      body: { prompt: 'hi' },
    });

    expect(request).toHaveBeenCalledWith('https://upstream.test/chat', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"prompt":"hi"}',
      signal: undefined,
      headersTimeout: 1234,
      bodyTimeout: 1234,
      dispatcher: undefined,
    });
    expect(response.status).toBe(200);
    expect(response.headers).toEqual({ 'content-type': 'text/event-stream', 'x-multi': '1, 2' });

    const chunks = await collect(response.body);
    expect(chunks.map((c) => Buffer.from(c).toString())).toEqual(['a', 'b']);
  });

  it('routes through a proxy agent when configured', async () => {
    const { request, ProxyAgent } = await import('undici');
    vi.mocked(request).mockResolvedValue({
      statusCode: 500,
      headers: {},
      body: Object.assign(bodyOf(), { text: vi.fn().mockResolvedValue('boom') }),
    } as unknown as Awaited<ReturnType<typeof request>>);

    const transport = new UndiciTransport({ proxy: 'http://127.0.0.1:8080' });
    const response = await transport.send({ url: 'https://upstream.test', method: 'GET', timeoutMs: 50 });

    expect(ProxyAgent).toHaveBeenCalledWith('http://127.0.0.1:8080');
    const options = vi.mocked(request).mock.calls[0]?.[1];
    expect(options?.dispatcher).toBeDefined();
    expect(options?.method).toBe('GET');
    expect(options?.body).toBeUndefined();
    expect(options?.headersTimeout).toBe(50);
    expect(await response.text()).toBe('boom');

    await transport.close();
  });
});
