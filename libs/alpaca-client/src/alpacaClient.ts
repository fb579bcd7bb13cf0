import { createAuthInterceptor, createDefaultHttpClient, createHeadersInterceptor } from '@alpaca-sdk/resilient-http-core';
import type {
  HttpClient,
  HttpMethod,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpResponse,
  QueryParams,
  ResilienceProfile,
  TransportRequest,
} from '@alpaca-sdk/resilient-http-core';
import type { z } from 'zod';
import type { AlpacaClientOptions, AuthMode, ClientConfig } from './types';

export const DEFAULT_BASE_DOMAIN = 'alpaca.markets';
export const KEY_ID_HEADER = 'APCA-API-KEY-ID';
export const SECRET_KEY_HEADER = 'APCA-API-SECRET-KEY';

export interface AlpacaRequest<T> {
  method: HttpMethod;
  /** Relative to the versioned base URL, e.g. `/orders`. */
  path: string;
  query?: QueryParams;
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  operation?: string;
  signal?: AbortSignal;
  resilience?: ResilienceProfile;
  /** Set to `false` for a DELETE that places orders, so it is never replayed. */
  idempotent?: boolean;
}

const authInterceptorFor = (auth: AuthMode): HttpRequestInterceptor => {
  switch (auth.type) {
    case 'keyPair':
      return createHeadersInterceptor({ [KEY_ID_HEADER]: auth.keyId, [SECRET_KEY_HEADER]: auth.secretKey });
    case 'oauth':
      return createAuthInterceptor({ getToken: () => auth.token });
  }
};

/**
 * One authenticated, host-routed client (broker or data).
 *
 * Holds no per-request state; every endpoint group built against it shares it.
 */
export class AlpacaClient {
  readonly baseUrl: string;
  private readonly http: HttpClient;

  constructor(
    readonly config: ClientConfig,
    options: AlpacaClientOptions = {},
  ) {
    this.baseUrl = `https://${config.host}.${options.baseDomain ?? DEFAULT_BASE_DOMAIN}/${config.version}`;
    this.http = createDefaultHttpClient({
      clientName: `alpaca-${config.host}`,
      baseUrl: this.baseUrl,
      transport: options.transport,
      logger: options.logger,
      metrics: options.metrics,
      clock: options.clock,
      defaultResilience: options.resilience,
      interceptors: [authInterceptorFor(config.auth)],
    });
  }

  execute<T>(request: AlpacaRequest<T>): Promise<HttpResponse<T>> {
    return this.http.execute(this.toOptions(request), request.schema);
  }

  async request<T>(request: AlpacaRequest<T>): Promise<T> {
    const response = await this.execute(request);
    return response.body;
  }

  /**
   * The request exactly as it would be sent, auth headers included. Nothing
   * goes over the wire.
   */
  buildRequest<T>(request: AlpacaRequest<T>): Promise<TransportRequest> {
    return this.http.prepareRequest(this.toOptions(request));
  }

  private toOptions<T>(request: AlpacaRequest<T>): HttpRequestOptions {
    return {
      method: request.method,
      path: request.path,
      query: request.query,
      body: request.body,
      operation: request.operation ?? `${request.method} ${request.path}`,
      signal: request.signal,
      resilience: request.resilience,
      idempotent: request.idempotent,
    };
  }
}
