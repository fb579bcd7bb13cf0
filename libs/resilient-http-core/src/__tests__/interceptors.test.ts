import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { HttpClient } from '../HttpClient';
import { createAuthInterceptor, createHeadersInterceptor } from '../interceptors';
import type { HttpRequestInterceptor, Logger, RawHttpResponse, TransportRequest } from '../types';

const ok = (): RawHttpResponse => ({ status: 200, headers: {}, body: '{}' });

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('createAuthInterceptor', () => {
  it('adds a bearer token', async () => {
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      interceptors: [createAuthInterceptor({ getToken: () => 'test-token' })],
    });

    const request = await client.prepareRequest({ method: 'GET', path: '/x' });

    expect(request.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
  });

  it('supports async tokens and custom formatting', async () => {
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      interceptors: [
        createAuthInterceptor({
          getToken: async () => 'test-token',
          headerName: 'X-Api-Key',
          formatToken: (token) => token,
        }),
      ],
    });

    const request = await client.prepareRequest({ method: 'GET', path: '/x' });

    expect(request.headers['X-Api-Key']).toBe('test-token');
  });

  it('leaves the request alone when there is no token', async () => {
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      interceptors: [createAuthInterceptor({ getToken: () => null })],
    });

    const request = await client.prepareRequest({ method: 'GET', path: '/x' });

    expect(request.headers).toEqual({ Accept: 'application/json' });
  });
});

describe('createHeadersInterceptor', () => {
  it('replaces same-named headers regardless of case', async () => {
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      interceptors: [createHeadersInterceptor({ 'APCA-API-KEY-ID': 'test-key' })],
    });

    const request = await client.prepareRequest({
      method: 'GET',
      path: '/x',
      headers: { 'apca-api-key-id': 'other' },
    });

    expect(request.headers).toEqual({ Accept: 'application/json', 'APCA-API-KEY-ID': 'test-key' });
  });
});

describe('interceptor ordering', () => {
  it('runs beforeSend in order and observers in reverse order', async () => {
    const calls: string[] = [];
    const track = (name: string): HttpRequestInterceptor => ({
      beforeSend: () => {
        calls.push(`${name}:beforeSend`);
      },
      afterResponse: () => {
        calls.push(`${name}:afterResponse`);
      },
    });
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      transport: async () => ok(),
      interceptors: [track('a'), track('b')],
    });

    await client.execute({ method: 'GET', path: '/x' }, z.object({}));

    expect(calls).toEqual(['a:beforeSend', 'b:beforeSend', 'b:afterResponse', 'a:afterResponse']);
  });

  it('runs beforeSend on every attempt with the attempt number', async () => {
    const attempts: number[] = [];
    const transport = vi
      .fn(async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => ok())
      .mockRejectedValueOnce(new Error('ECONNRESET'));
    const onError = vi.fn();
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      transport,
      clock: { now: () => 0, sleep: async () => undefined },
      interceptors: [
        {
          beforeSend: (ctx) => {
            attempts.push(ctx.attempt);
          },
          onError,
        },
      ],
    });

    await client.execute({ method: 'GET', path: '/x' }, z.object({}));

    expect(attempts).toEqual([1, 2]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, error: new Error('ECONNRESET') }));
  });

  it('logs observer failures without failing the call', async () => {
    const logger = createLogger();
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      clientName: 'test-client',
      transport: async () => ok(),
      logger,
      interceptors: [
        {
          afterResponse: () => {
            throw new Error('observer broke');
          },
        },
      ],
    });

    await expect(client.requestJson({ method: 'GET', path: '/x', operation: 'x.get' }, z.object({}))).resolves.toEqual({});
    expect(logger.warn).toHaveBeenCalledWith('http.interceptor.afterResponse.failed', {
      client: 'test-client',
      operation: 'x.get',
      error: 'observer broke',
    });
  });

  it('aborts the call when beforeSend throws', async () => {
    const transport = vi.fn(async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => ok());
    const client = new HttpClient({
      baseUrl: 'https://example.com',
      transport,
      interceptors: [
        {
          beforeSend: () => {
            throw new Error('no credentials');
          },
        },
      ],
    });

    await expect(client.execute({ method: 'GET', path: '/x' }, z.object({}))).rejects.toThrow('no credentials');
    expect(transport).not.toHaveBeenCalled();
  });
});
