import { marketClockSchema } from '../models/clock';
import type { MarketClock } from '../models/clock';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export class ClockEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/clock', 'clock');
  }

  /** Current market timestamp and the next open and close. */
  get(options?: CallOptions): Promise<MarketClock> {
    return this.call('get', { method: 'GET', path: this.path(), schema: marketClockSchema }, options);
  }
}
