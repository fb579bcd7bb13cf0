import { DEFAULT_RESILIENCE } from '@alpaca-sdk/resilient-http-core';
import type { ResilienceProfile } from '@alpaca-sdk/resilient-http-core';
import { AlpacaAPI } from './alpacaApi';
import { parseDataApiType, parseEndpointApiType } from './credentials';
import type { AlpacaAPIConfig, DataAPIType, EndpointAPIType } from './types';

const DEFAULT_ENDPOINT_API_TYPE: EndpointAPIType = 'PAPER';
const DEFAULT_DATA_API_TYPE: DataAPIType = 'IEX';

/**
 * Creates an AlpacaAPI from environment variables, with `overrides` applied on top.
 *
 * Credentials given in `overrides` replace the environment's credentials as a
 * whole, so an override token never collides with an env key pair.
 */
export function createAlpacaAPI(overrides: Partial<AlpacaAPIConfig> = {}): AlpacaAPI {
  const env = process.env;
  const overridesCredentials =
    overrides.keyId !== undefined || overrides.secretKey !== undefined || overrides.oauthToken !== undefined;

  const endpointApiType = env.APCA_ENDPOINT_API_TYPE
    ? parseEndpointApiType(env.APCA_ENDPOINT_API_TYPE)
    : DEFAULT_ENDPOINT_API_TYPE;
  const dataApiType = env.APCA_DATA_API_TYPE ? parseDataApiType(env.APCA_DATA_API_TYPE) : DEFAULT_DATA_API_TYPE;

  const resilience: ResilienceProfile = {
    maxAttempts: parseNumberOrDefault(env.APCA_MAX_ATTEMPTS, DEFAULT_RESILIENCE.maxAttempts),
    baseBackoffMs: parseNumberOrDefault(env.APCA_BASE_BACKOFF_MS, DEFAULT_RESILIENCE.baseBackoffMs),
    maxBackoffMs: parseNumberOrDefault(env.APCA_MAX_BACKOFF_MS, DEFAULT_RESILIENCE.maxBackoffMs),
    overallTimeoutMs: parseNumberOrDefault(env.APCA_OVERALL_TIMEOUT_MS, DEFAULT_RESILIENCE.overallTimeoutMs),
    perAttemptTimeoutMs: parseNumberOrDefault(env.APCA_ATTEMPT_TIMEOUT_MS, DEFAULT_RESILIENCE.perAttemptTimeoutMs),
  };

  return new AlpacaAPI({
    ...(overridesCredentials
      ? {}
      : {
          keyId: env.APCA_API_KEY_ID,
          secretKey: env.APCA_API_SECRET_KEY,
          oauthToken: env.APCA_API_OAUTH_TOKEN,
        }),
    endpointApiType,
    dataApiType,
    ...overrides,
    resilience: { ...resilience, ...overrides.resilience },
  });
}

function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
