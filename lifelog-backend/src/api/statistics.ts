import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../services.js';
import { addDays, minutesOfDay, toCalendarDate } from '../utils/dates.js';
import { validationError } from './validation.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const PERIOD_DAYS = {
  today: 0,
  week: 7,
  month: 30,
} as const;

const querySchema = z.object({
  period: z.enum(['today', 'week', 'month', 'all']).default('today'),
});

export type StatisticsPeriod = z.infer<typeof querySchema>['period'];

/** First calendar date included in a statistics period. */
export function periodStart(period: StatisticsPeriod, today: string): string {
  if (period === 'all') return '0000-01-01';
  return addDays(today, -PERIOD_DAYS[period]);
}

/** Event counts per local clock hour ("09:00"), hours without events left out. */
export function hourlyHistogram(timestamps: string[], timeZone: string): Array<{ hour: string; count: number }> {
  const counts = new Map<number, number>();
  for (const ts of timestamps) {
    const hour = Math.floor(minutesOfDay(new Date(ts), timeZone) / 60);
    counts.set(hour, (counts.get(hour) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a - b)
    .map(([hour, count]) => ({ hour: `${String(hour).padStart(2, '0')}:00`, count }));
}

/**
 * GET /api/statistics?period=today|week|month|all
 */
export function createStatisticsRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const parsed = querySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json(validationError(parsed.error));
      return;
    }

    const { period } = parsed.data;
    const since = periodStart(period, toCalendarDate(new Date(), services.timeZone));
    const summary = services.activities.summary(since);
    const last24h = services.activities.timestampsSince(new Date(Date.now() - DAY_MS).toISOString());

    res.json({
      period,
      since,
      ...summary,
      totalCost: Math.round(summary.totalCost * 10_000) / 10_000,
      hourly: hourlyHistogram(last24h, services.timeZone),
    });
  });

  return router;
}
