import { z } from 'zod';
import { calendarDaySchema } from '../models/calendar';
import type { CalendarDay } from '../models/calendar';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export interface CalendarParams {
  /** `YYYY-MM-DD`, inclusive. */
  start?: string;
  end?: string;
}

export class CalendarEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/calendar', 'calendar');
  }

  get(params: CalendarParams = {}, options?: CallOptions): Promise<CalendarDay[]> {
    return this.call(
      'get',
      {
        method: 'GET',
        path: this.path(),
        query: { start: params.start, end: params.end },
        schema: z.array(calendarDaySchema),
      },
      options,
    );
  }
}
