import { z } from 'zod';
import { accountActivitySchema } from '../models/accountActivities';
import type { AccountActivity } from '../models/accountActivities';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export interface AccountActivitiesParams {
  /** e.g. `FILL`, `DIV`, `TRANS`. All types when omitted. */
  activityTypes?: string[];
  date?: string;
  until?: string;
  after?: string;
  direction?: 'asc' | 'desc';
  pageSize?: number;
  pageToken?: string;
}

export class AccountActivitiesEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/account/activities', 'accountActivities');
  }

  get(params: AccountActivitiesParams = {}, options?: CallOptions): Promise<AccountActivity[]> {
    return this.call(
      'get',
      {
        method: 'GET',
        path: this.path(),
        query: {
          activity_types: params.activityTypes,
          date: params.date,
          until: params.until,
          after: params.after,
          direction: params.direction,
          page_size: params.pageSize,
          page_token: params.pageToken,
        },
        schema: z.array(accountActivitySchema),
      },
      options,
    );
  }
}
