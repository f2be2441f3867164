/**
 * GET /api/calendar?from=YYYY-MM-DD&to=YYYY-MM-DD
 *
 * Events shaped for a calendar view. Both dates are inclusive and read in the
 * configured time zone; unless both are given the current month is returned.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { CaptureEventRow } from '../db/schema.js';
import type { AppServices } from '../services.js';
import { addDays, toCalendarDate } from '../utils/dates.js';
import { validationError } from './validation.js';

const querySchema = z
  .object({
    from: z.string().date().optional(),
    to: z.string().date().optional(),
  })
  .refine((q) => !q.from || !q.to || q.from <= q.to, { message: '"from" must not be after "to"', path: ['from'] });

export interface CalendarEvent {
  id: number;
  title: string;
  start: string;
  extendedProps: {
    camera: string;
    room: string;
    activity: string | null;
    details: string | null;
    category: string | null;
    person: string | null;
    imagePath: string | null;
    cost: number | null;
  };
}

/** First and last calendar date of the month containing `today`. */
export function monthRange(today: string): { from: string; to: string } {
  const from = `${today.slice(0, 8)}01`;
  // Day 28 plus four always lands in the next month
  const nextMonth = `${addDays(`${today.slice(0, 8)}28`, 4).slice(0, 8)}01`;
  return { from, to: addDays(nextMonth, -1) };
}

export function toCalendarEvent(event: CaptureEventRow): CalendarEvent {
  return {
    id: event.id,
    title: `${event.room} - ${event.activity ?? 'Activity'}`,
    start: event.timestamp,
    extendedProps: {
      camera: event.cameraId,
      room: event.room,
      activity: event.activity,
      details: event.details,
      category: event.category,
      person: event.personLabel,
      imagePath: event.imagePath,
      cost: event.cost,
    },
  };
}

export function createCalendarRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const parsed = querySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json(validationError(parsed.error));
      return;
    }

    const q = parsed.data;
    const { from, to } = q.from && q.to
      ? { from: q.from, to: q.to }
      : monthRange(toCalendarDate(new Date(), services.timeZone));
    const events = services.activities.listBetweenDates(from, to).map(toCalendarEvent);

    res.json({ from, to, events, total: events.length });
  });

  return router;
}
