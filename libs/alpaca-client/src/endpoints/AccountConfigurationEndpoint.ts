import { accountConfigurationSchema } from '../models/accountConfiguration';
import type { AccountConfiguration } from '../models/accountConfiguration';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export class AccountConfigurationEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/account/configurations', 'accountConfiguration');
  }

  get(options?: CallOptions): Promise<AccountConfiguration> {
    return this.call('get', { method: 'GET', path: this.path(), schema: accountConfigurationSchema }, options);
  }

  /**
   * Updates the given settings and returns the full configuration. Fields left
   * out keep their current value.
   */
  set(configuration: Partial<AccountConfiguration>, options?: CallOptions): Promise<AccountConfiguration> {
    return this.call(
      'set',
      { method: 'PATCH', path: this.path(), body: configuration, schema: accountConfigurationSchema },
      options,
    );
  }
}
