/**
 * REST API for the derived timeline.
 *
 * Endpoints:
 *   GET  /api/timeline               last 24 hours of person-labelled events
 *   POST /api/timeline/recompute     full duration recompute + streak refresh
 *   GET  /api/streaks
 */

import { Router } from 'express';
import type { CaptureEventRow } from '../db/schema.js';
import type { AppServices } from '../services.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** "45 min", "2h", "1h 30m"; null when there is no duration. */
export function formatDuration(minutes: number | null): string | null {
  if (!minutes) return null;
  if (minutes < 60) return `${minutes} min`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
}

export interface TimelineEntry {
  id: number;
  timestamp: string;
  time: string;
  person: string;
  location: string;
  activity: string;
  category: string;
  durationMinutes: number | null;
  duration: string | null;
}

export function toTimelineEntry(event: CaptureEventRow, timeZone: string): TimelineEntry {
  const time = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  }).format(new Date(event.timestamp));

  return {
    id: event.id,
    timestamp: event.timestamp,
    time,
    person: event.personLabel ?? 'Unknown',
    location: event.room,
    activity: event.activity ?? 'Activity',
    category: event.category ?? 'Other',
    durationMinutes: event.durationMinutes,
    duration: formatDuration(event.durationMinutes),
  };
}

export function createTimelineRouter(services: AppServices): Router {
  const router = Router();
  const { activities, streaks, maintenance, operatorName, timeZone } = services;

  router.get('/timeline', (_req, res) => {
    const since = new Date(Date.now() - DAY_MS).toISOString();
    const entries = activities.listSince(since)
      .filter((e) => e.personLabel !== null)
      .map((e) => toTimelineEntry(e, timeZone));

    res.json({ period: 'last_24_hours', activities: entries, total: entries.length });
  });

  router.post('/timeline/recompute', (_req, res) => {
    const result = maintenance.refresh('recompute');
    console.log(`[Timeline] Recompute: ${result.durations.updated} of ${result.durations.examined} durations changed`);
    res.json(result);
  });

  router.get('/streaks', (_req, res) => {
    const streak = streaks.get(operatorName);
    res.json({
      userId: operatorName,
      currentStreak: streak?.currentStreak ?? 0,
      longestStreak: streak?.longestStreak ?? 0,
      lastActivityDate: streak?.lastActivityDate ?? null,
      updatedAt: streak?.updatedAt ?? null,
    });
  });

  return router;
}
