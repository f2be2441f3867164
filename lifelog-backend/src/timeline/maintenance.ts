/**
 * Timeline maintenance: fills missing durations and refreshes the operator's
 * streak on start and then every TIMELINE_INTERVAL_MIN minutes.
 */

import type { ActivityStore } from '../db/activity-store.js';
import type { StreakStore } from '../db/streak-store.js';
import { toCalendarDate } from '../utils/dates.js';
import { errorMessage } from '../utils/errors.js';
import { runDurationPass, type DurationPassMode, type DurationPassResult } from './durations.js';
import { refreshStreaks } from './streaks.js';
import type { UserStreakRow } from '../db/schema.js';

export interface TimelineMaintenanceOptions {
  activities: ActivityStore;
  streaks: StreakStore;
  userId: string;
  timeZone: string;
  ceilingMinutes: number;
  intervalMinutes: number;
}

export interface RefreshResult {
  durations: DurationPassResult;
  streak: UserStreakRow;
}

export class TimelineMaintenance {
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: TimelineMaintenanceOptions) {}

  /** Duration pass followed by a streak refresh. Errors propagate. */
  refresh(mode: DurationPassMode = 'fill', now: Date = new Date()): RefreshResult {
    const { activities, streaks, userId, timeZone, ceilingMinutes } = this.options;
    const durations = runDurationPass(activities, mode, { ceilingMinutes });
    const streak = refreshStreaks(activities, streaks, userId, toCalendarDate(now, timeZone));
    return { durations, streak };
  }

  start(): void {
    if (this.intervalId !== null) {
      console.warn('[Timeline] Maintenance already running');
      return;
    }

    // Run once immediately on startup
    this.runScheduled();

    this.intervalId = setInterval(() => this.runScheduled(), this.options.intervalMinutes * 60_000);
    console.log(`[Timeline] Maintenance started (every ${this.options.intervalMinutes} min)`);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      console.log('[Timeline] Maintenance stopped');
    }
  }

  private runScheduled(): void {
    try {
      const { durations, streak } = this.refresh('fill');
      if (durations.updated > 0) {
        console.log(`[Timeline] Filled ${durations.updated} durations (${durations.examined} events)`);
      }
      console.log(`[Timeline] Streak: current ${streak.currentStreak}, longest ${streak.longestStreak}`);
    } catch (err) {
      console.error('[Timeline] Maintenance run failed:', errorMessage(err));
    }
  }
}
