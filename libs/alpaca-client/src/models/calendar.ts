import { z } from 'zod';

export const calendarDaySchema = z.object({
  date: z.string(),
  open: z.string(),
  close: z.string(),
  session_open: z.string().optional(),
  session_close: z.string().optional(),
  settlement_date: z.string().optional(),
});

export type CalendarDay = z.infer<typeof calendarDaySchema>;
