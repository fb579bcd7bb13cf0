import { portfolioHistorySchema } from '../models/portfolioHistory';
import type { PortfolioHistory } from '../models/portfolioHistory';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export type PortfolioHistoryPeriod = `${number}${'D' | 'W' | 'M' | 'A'}`;
export type PortfolioHistoryTimeframe = '1Min' | '5Min' | '15Min' | '1H' | '1D';

export interface PortfolioHistoryParams {
  period?: PortfolioHistoryPeriod;
  timeframe?: PortfolioHistoryTimeframe;
  /** `YYYY-MM-DD`. */
  dateEnd?: string;
  extendedHours?: boolean;
}

export class PortfolioHistoryEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/account/portfolio/history', 'portfolioHistory');
  }

  get(params: PortfolioHistoryParams = {}, options?: CallOptions): Promise<PortfolioHistory> {
    return this.call(
      'get',
      {
        method: 'GET',
        path: this.path(),
        query: {
          period: params.period,
          timeframe: params.timeframe,
          date_end: params.dateEnd,
          extended_hours: params.extendedHours,
        },
        schema: portfolioHistorySchema,
      },
      options,
    );
  }
}
