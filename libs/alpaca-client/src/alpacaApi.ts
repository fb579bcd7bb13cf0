import { ConfigurationError, ConsoleLogger } from '@alpaca-sdk/resilient-http-core';
import type { Logger } from '@alpaca-sdk/resilient-http-core';
import { AlpacaClient } from './alpacaClient';
import { resolveClientConfigs } from './credentials';
import { AccountActivitiesEndpoint } from './endpoints/AccountActivitiesEndpoint';
import { AccountConfigurationEndpoint } from './endpoints/AccountConfigurationEndpoint';
import { AccountEndpoint } from './endpoints/AccountEndpoint';
import { AssetsEndpoint } from './endpoints/AssetsEndpoint';
import { CalendarEndpoint } from './endpoints/CalendarEndpoint';
import { ClockEndpoint } from './endpoints/ClockEndpoint';
import { MarketDataEndpoint } from './endpoints/MarketDataEndpoint';
import { OrdersEndpoint } from './endpoints/OrdersEndpoint';
import { PortfolioHistoryEndpoint } from './endpoints/PortfolioHistoryEndpoint';
import { PositionsEndpoint } from './endpoints/PositionsEndpoint';
import { WatchlistEndpoint } from './endpoints/WatchlistEndpoint';
import type { AlpacaAPIConfig, AlpacaClientOptions } from './types';

/**
 * Entry point to the trading and market data APIs.
 *
 * Credentials are resolved once, in the constructor. Under OAuth there is no
 * data client: {@link marketData} and {@link getDataClient} return `null` and
 * {@link requireMarketData} throws.
 *
 * @example
 * ```typescript
 * const api = new AlpacaAPI({
 *   keyId: 'test-key',
 *   secretKey: 'test-secret',
 *   endpointApiType: 'PAPER',
 *   dataApiType: 'IEX',
 * });
 *
 * const clock = await api.clock().get();
 * const order = await api.orders().submit({
 *   symbol: 'AAPL',
 *   qty: 1,
 *   side: 'buy',
 *   type: 'market',
 *   timeInForce: 'day',
 * });
 * ```
 */
export class AlpacaAPI {
  private readonly brokerClient: AlpacaClient;
  private readonly dataClient: AlpacaClient | null;

  private readonly accountEndpoint: AccountEndpoint;
  private readonly marketDataEndpoint: MarketDataEndpoint | null;
  private readonly ordersEndpoint: OrdersEndpoint;
  private readonly positionsEndpoint: PositionsEndpoint;
  private readonly assetsEndpoint: AssetsEndpoint;
  private readonly watchlistEndpoint: WatchlistEndpoint;
  private readonly calendarEndpoint: CalendarEndpoint;
  private readonly clockEndpoint: ClockEndpoint;
  private readonly accountConfigurationEndpoint: AccountConfigurationEndpoint;
  private readonly accountActivitiesEndpoint: AccountActivitiesEndpoint;
  private readonly portfolioHistoryEndpoint: PortfolioHistoryEndpoint;

  constructor(config: AlpacaAPIConfig) {
    const resolved = resolveClientConfigs(config);
    const logger: Logger = config.logger ?? new ConsoleLogger();
    const options: AlpacaClientOptions = {
      transport: config.transport,
      logger,
      metrics: config.metrics,
      clock: config.clock,
      resilience: config.resilience,
      baseDomain: config.baseDomain,
    };

    this.brokerClient = new AlpacaClient(resolved.broker, options);
    this.dataClient = resolved.data ? new AlpacaClient(resolved.data, options) : null;

    this.accountEndpoint = new AccountEndpoint(this.brokerClient);
    this.marketDataEndpoint = this.dataClient ? new MarketDataEndpoint(this.dataClient, resolved.dataApiType) : null;
    this.ordersEndpoint = new OrdersEndpoint(this.brokerClient);
    this.positionsEndpoint = new PositionsEndpoint(this.brokerClient);
    this.assetsEndpoint = new AssetsEndpoint(this.brokerClient);
    this.watchlistEndpoint = new WatchlistEndpoint(this.brokerClient);
    this.calendarEndpoint = new CalendarEndpoint(this.brokerClient);
    this.clockEndpoint = new ClockEndpoint(this.brokerClient);
    this.accountConfigurationEndpoint = new AccountConfigurationEndpoint(this.brokerClient);
    this.accountActivitiesEndpoint = new AccountActivitiesEndpoint(this.brokerClient);
    this.portfolioHistoryEndpoint = new PortfolioHistoryEndpoint(this.brokerClient);

    logger.info('alpaca.api.created', {
      authMode: resolved.broker.auth.type,
      brokerUrl: this.brokerClient.baseUrl,
      dataUrl: this.dataClient?.baseUrl ?? null,
      dataApiType: resolved.dataApiType,
    });
  }

  account(): AccountEndpoint {
    return this.accountEndpoint;
  }

  /** `null` under OAuth. */
  marketData(): MarketDataEndpoint | null {
    return this.marketDataEndpoint;
  }

  requireMarketData(): MarketDataEndpoint {
    if (!this.marketDataEndpoint) {
      throw new ConfigurationError('Market data is not available with OAuth authentication; use a key pair');
    }
    return this.marketDataEndpoint;
  }

  orders(): OrdersEndpoint {
    return this.ordersEndpoint;
  }

  positions(): PositionsEndpoint {
    return this.positionsEndpoint;
  }

  assets(): AssetsEndpoint {
    return this.assetsEndpoint;
  }

  watchlist(): WatchlistEndpoint {
    return this.watchlistEndpoint;
  }

  calendar(): CalendarEndpoint {
    return this.calendarEndpoint;
  }

  clock(): ClockEndpoint {
    return this.clockEndpoint;
  }

  accountConfiguration(): AccountConfigurationEndpoint {
    return this.accountConfigurationEndpoint;
  }

  accountActivities(): AccountActivitiesEndpoint {
    return this.accountActivitiesEndpoint;
  }

  portfolioHistory(): PortfolioHistoryEndpoint {
    return this.portfolioHistoryEndpoint;
  }

  getBrokerClient(): AlpacaClient {
    return this.brokerClient;
  }

  getDataClient(): AlpacaClient | null {
    return this.dataClient;
  }
}
