import { z } from 'zod';
import { assetSchema } from '../models/assets';
import type { Asset } from '../models/assets';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export interface ListAssetsParams {
  status?: 'active' | 'inactive';
  assetClass?: string;
  exchange?: string;
}

export class AssetsEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/assets', 'assets');
  }

  list(params: ListAssetsParams = {}, options?: CallOptions): Promise<Asset[]> {
    return this.call(
      'list',
      {
        method: 'GET',
        path: this.path(),
        query: { status: params.status, asset_class: params.assetClass, exchange: params.exchange },
        schema: z.array(assetSchema),
      },
      options,
    );
  }

  get(symbolOrAssetId: string, options?: CallOptions): Promise<Asset> {
    return this.call('get', { method: 'GET', path: this.path(symbolOrAssetId), schema: assetSchema }, options);
  }
}
