import { accountSchema } from '../models/account';
import type { Account } from '../models/account';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export class AccountEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/account', 'account');
  }

  get(options?: CallOptions): Promise<Account> {
    return this.call('get', { method: 'GET', path: this.path(), schema: accountSchema }, options);
  }
}
