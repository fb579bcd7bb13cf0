import { ConfigurationError } from '@alpaca-sdk/resilient-http-core';
import { DATA_API_TYPES, ENDPOINT_API_TYPES } from './types';
import type {
  AuthMode,
  ClientConfig,
  CredentialInput,
  DataAPIType,
  EndpointAPIType,
  ResolvedClientConfigs,
} from './types';

export const API_VERSION = 'v2';
export const DATA_HOST = 'data';

export const BROKER_HOSTS = {
  LIVE: 'live',
  PAPER: 'paper-api',
} as const satisfies Record<EndpointAPIType, string>;

export const brokerHostFor = (type: EndpointAPIType): string => {
  switch (type) {
    case 'LIVE':
      return BROKER_HOSTS.LIVE;
    case 'PAPER':
      return BROKER_HOSTS.PAPER;
    default: {
      const unknownType: never = type;
      throw new ConfigurationError(`Unknown endpoint API type: ${String(unknownType)}`);
    }
  }
};

/** Value of the `feed` query parameter for a data API type. */
export const feedFor = (type: DataAPIType): 'iex' | 'sip' => {
  switch (type) {
    case 'IEX':
      return 'iex';
    case 'SIP':
      return 'sip';
    default: {
      const unknownType: never = type;
      throw new ConfigurationError(`Unknown data API type: ${String(unknownType)}`);
    }
  }
};

export const parseEndpointApiType = (value: string): EndpointAPIType => {
  const normalized = value.trim().toUpperCase();
  const match = ENDPOINT_API_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new ConfigurationError(`Unknown endpoint API type "${value}" (expected one of ${ENDPOINT_API_TYPES.join(', ')})`);
  }
  return match;
};

export const parseDataApiType = (value: string): DataAPIType => {
  const normalized = value.trim().toUpperCase();
  const match = DATA_API_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new ConfigurationError(`Unknown data API type "${value}" (expected one of ${DATA_API_TYPES.join(', ')})`);
  }
  return match;
};

const present = (value?: string): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const resolveAuth = (input: CredentialInput): AuthMode => {
  const keyId = present(input.keyId);
  const secretKey = present(input.secretKey);
  const token = present(input.oauthToken);

  if (token && (keyId || secretKey)) {
    throw new ConfigurationError('Provide either a key pair or an OAuth token, not both');
  }
  if (token) {
    return { type: 'oauth', token };
  }
  if (keyId && secretKey) {
    return { type: 'keyPair', keyId, secretKey };
  }
  if (keyId || secretKey) {
    throw new ConfigurationError('Key-pair authentication needs both keyId and secretKey');
  }
  throw new ConfigurationError('No credentials provided: set keyId and secretKey, or oauthToken');
};

const freezeConfig = (auth: AuthMode, host: string): ClientConfig =>
  Object.freeze({ auth: Object.freeze({ ...auth }), host, version: API_VERSION });

/**
 * Decides the auth mode and host routing for the broker and data clients.
 *
 * Throws {@link ConfigurationError} for missing or conflicting credentials and
 * for missing or unknown API types. Under OAuth no data client config is
 * produced.
 */
export function resolveClientConfigs(input: CredentialInput): ResolvedClientConfigs {
  if (!input.endpointApiType) {
    throw new ConfigurationError('endpointApiType is required');
  }
  if (!input.dataApiType) {
    throw new ConfigurationError('dataApiType is required');
  }
  const brokerHost = brokerHostFor(input.endpointApiType);
  // throws for values outside DataAPIType
  feedFor(input.dataApiType);

  const auth = resolveAuth(input);
  return {
    broker: freezeConfig(auth, brokerHost),
    data: auth.type === 'oauth' ? null : freezeConfig(auth, DATA_HOST),
    dataApiType: input.dataApiType,
  };
}
