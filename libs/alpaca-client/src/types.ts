import type { Clock, HttpTransport, Logger, MetricsSink, ResilienceProfile } from '@alpaca-sdk/resilient-http-core';

export const ENDPOINT_API_TYPES = ['LIVE', 'PAPER'] as const;

/** Trading environment the broker client talks to. */
export type EndpointAPIType = (typeof ENDPOINT_API_TYPES)[number];

export const DATA_API_TYPES = ['IEX', 'SIP'] as const;

/** Market data feed requested from the data API. */
export type DataAPIType = (typeof DATA_API_TYPES)[number];

export type AuthMode =
  | { readonly type: 'keyPair'; readonly keyId: string; readonly secretKey: string }
  | { readonly type: 'oauth'; readonly token: string };

/**
 * Immutable description of one client: how it authenticates and where it
 * routes. Built by the credential resolver and never mutated afterwards.
 */
export interface ClientConfig {
  readonly auth: AuthMode;
  /** Host subdomain, e.g. `paper-api`, `live` or `data`. */
  readonly host: string;
  /** API version path segment, e.g. `v2`. */
  readonly version: string;
}

export interface CredentialInput {
  keyId?: string;
  secretKey?: string;
  oauthToken?: string;
  endpointApiType?: EndpointAPIType;
  dataApiType?: DataAPIType;
}

export interface ResolvedClientConfigs {
  broker: ClientConfig;
  /** `null` under OAuth: the data API does not accept OAuth tokens. */
  data: ClientConfig | null;
  dataApiType: DataAPIType;
}

/**
 * Transport-level options shared by the broker and data clients.
 */
export interface AlpacaClientOptions {
  transport?: HttpTransport;
  logger?: Logger;
  metrics?: MetricsSink;
  clock?: Clock;
  resilience?: ResilienceProfile;
  /** Defaults to `alpaca.markets`. */
  baseDomain?: string;
}

export interface AlpacaAPIConfig extends CredentialInput, AlpacaClientOptions {}

/**
 * Per-call options accepted by every endpoint operation.
 */
export interface CallOptions {
  signal?: AbortSignal;
  resilience?: ResilienceProfile;
}
