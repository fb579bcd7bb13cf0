/**
 * @alpaca-sdk/alpaca-client
 *
 * Typed client for the Alpaca trading and market data APIs.
 *
 * ## Architecture
 *
 * - **Credential resolver**: key pair or OAuth token, paper or live routing
 * - **AlpacaClient**: one authenticated client per host (broker, data), built on
 *   `@alpaca-sdk/resilient-http-core` for retries, timeouts and decoding
 * - **Endpoint groups**: thin wrappers per API area (orders, positions, ...)
 * - **AlpacaAPI**: composes the clients and endpoint groups
 *
 * ## Usage
 *
 * ```typescript
 * import { createAlpacaAPI } from '@alpaca-sdk/alpaca-client';
 *
 * // Reads APCA_* environment variables
 * const api = createAlpacaAPI();
 *
 * const account = await api.account().get();
 * const bars = await api.requireMarketData().getAllBars('AAPL', {
 *   timeframe: '1Day',
 *   start: '2024-01-02',
 *   end: '2024-03-28',
 * });
 * ```
 *
 * ## Environment Variables
 *
 * Credentials (a key pair or a token):
 * - `APCA_API_KEY_ID`, `APCA_API_SECRET_KEY`
 * - `APCA_API_OAUTH_TOKEN` - market data is unavailable with OAuth
 *
 * Optional:
 * - `APCA_ENDPOINT_API_TYPE` - `PAPER` (default) or `LIVE`
 * - `APCA_DATA_API_TYPE` - `IEX` (default) or `SIP`
 * - `APCA_MAX_ATTEMPTS` - attempts per call (default: 5)
 * - `APCA_BASE_BACKOFF_MS` - first retry delay (default: 250)
 * - `APCA_MAX_BACKOFF_MS` - retry delay cap (default: 8000)
 * - `APCA_OVERALL_TIMEOUT_MS` - budget per call across attempts (default: 60000)
 * - `APCA_ATTEMPT_TIMEOUT_MS` - budget per attempt (default: 30000)
 */

// ============================================================================
// Primary API - Facade and Factory
// ============================================================================

export { AlpacaAPI } from './alpacaApi';
export { createAlpacaAPI } from './factory';
export { AlpacaClient, DEFAULT_BASE_DOMAIN, KEY_ID_HEADER, SECRET_KEY_HEADER } from './alpacaClient';
export type { AlpacaRequest } from './alpacaClient';
export {
  API_VERSION,
  BROKER_HOSTS,
  DATA_HOST,
  brokerHostFor,
  feedFor,
  parseDataApiType,
  parseEndpointApiType,
  resolveClientConfigs,
} from './credentials';

// ============================================================================
// Endpoint Groups
// ============================================================================

export { AbstractEndpoint } from './endpoints/AbstractEndpoint';
export { AccountEndpoint } from './endpoints/AccountEndpoint';
export { AccountActivitiesEndpoint } from './endpoints/AccountActivitiesEndpoint';
export type { AccountActivitiesParams } from './endpoints/AccountActivitiesEndpoint';
export { AccountConfigurationEndpoint } from './endpoints/AccountConfigurationEndpoint';
export { AssetsEndpoint } from './endpoints/AssetsEndpoint';
export type { ListAssetsParams } from './endpoints/AssetsEndpoint';
export { CalendarEndpoint } from './endpoints/CalendarEndpoint';
export type { CalendarParams } from './endpoints/CalendarEndpoint';
export { ClockEndpoint } from './endpoints/ClockEndpoint';
export { MarketDataEndpoint } from './endpoints/MarketDataEndpoint';
export type {
  BarTimeframe,
  BarsParams,
  PaginationLimits,
  QuotesParams,
  TradesParams,
} from './endpoints/MarketDataEndpoint';
export { OrdersEndpoint } from './endpoints/OrdersEndpoint';
export type { ListOrdersParams } from './endpoints/OrdersEndpoint';
export { PortfolioHistoryEndpoint } from './endpoints/PortfolioHistoryEndpoint';
export type {
  PortfolioHistoryParams,
  PortfolioHistoryPeriod,
  PortfolioHistoryTimeframe,
} from './endpoints/PortfolioHistoryEndpoint';
export { PositionsEndpoint } from './endpoints/PositionsEndpoint';
export type { ClosePositionParams } from './endpoints/PositionsEndpoint';
export { WatchlistEndpoint } from './endpoints/WatchlistEndpoint';

// ============================================================================
// Models and Types
// ============================================================================

export * from './models';
export { DATA_API_TYPES, ENDPOINT_API_TYPES } from './types';
export type {
  AlpacaAPIConfig,
  AlpacaClientOptions,
  AuthMode,
  CallOptions,
  ClientConfig,
  CredentialInput,
  DataAPIType,
  EndpointAPIType,
  ResolvedClientConfigs,
} from './types';

// Errors callers catch come from the core package.
export {
  ApiError,
  CancelledError,
  ConfigurationError,
  DecodingError,
  HttpClientError,
  TransportError,
  UnclassifiedApiError,
  isHttpClientError,
} from '@alpaca-sdk/resilient-http-core';
