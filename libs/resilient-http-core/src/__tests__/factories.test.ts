import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { ConsoleLogger, createDefaultHttpClient } from '../factories';
import { HttpClient } from '../HttpClient';
import type { RawHttpResponse, TransportRequest } from '../types';

describe('createDefaultHttpClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it('uses fetch and the console logger by default', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response('{"ok":true}', { status: 200, headers: { 'X-RateLimit-Remaining': '199' } }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    const client = createDefaultHttpClient({ clientName: 'default-test', baseUrl: 'https://example.com/v2' });
    const response = await client.execute({ method: 'GET', path: '/clock' }, z.object({ ok: z.boolean() }));

    expect(client).toBeInstanceOf(HttpClient);
    expect(client.getBaseUrl()).toBe('https://example.com/v2');
    expect(response.body).toEqual({ ok: true });
    expect(response.headers['x-ratelimit-remaining']).toBe('199');
    expect(response.outcome.rateLimit?.remaining).toBe(199);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com/v2/clock',
      expect.objectContaining({ method: 'GET', headers: { Accept: 'application/json' } }),
    );
    expect(info).toHaveBeenCalledWith('http.request.success', expect.objectContaining({ client: 'default-test' }));
  });

  it('accepts an injected transport and resilience overrides', async () => {
    const transport = vi.fn(
      async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => ({ status: 503, headers: {}, body: '' }),
    );
    const client = createDefaultHttpClient({
      clientName: 'default-test',
      baseUrl: 'https://example.com',
      transport,
      logger: new ConsoleLogger(),
      defaultResilience: { maxAttempts: 1 },
    });
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(client.execute({ method: 'GET', path: '/x' }, z.unknown())).rejects.toMatchObject({ status: 503 });
    expect(transport).toHaveBeenCalledTimes(1);
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('forwards each level to the matching console method', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    new ConsoleLogger().warn('http.request.retry', { attempt: 1 });
    expect(warn).toHaveBeenCalledWith('http.request.retry', { attempt: 1 });
  });
});
