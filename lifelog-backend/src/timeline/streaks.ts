import type { ActivityStore } from '../db/activity-store.js';
import type { StreakStore, StreakValues } from '../db/streak-store.js';
import type { UserStreakRow } from '../db/schema.js';
import { addDays, daysBetween } from '../utils/dates.js';

/**
 * Current and longest runs of consecutive active days.
 *
 * The current streak is the run ending today, or yesterday when today has no
 * activity yet; 0 when neither day is active. Recomputed from scratch on every
 * call.
 */
export function calculateStreaks(dates: Iterable<string>, today: string): StreakValues {
  const present = new Set(dates);
  if (present.size === 0) {
    return { currentStreak: 0, longestStreak: 0, lastActivityDate: null };
  }

  const ascending = [...present].sort();

  let currentStreak = 0;
  const yesterday = addDays(today, -1);
  let cursor: string | null = present.has(today) ? today : present.has(yesterday) ? yesterday : null;
  while (cursor !== null && present.has(cursor)) {
    currentStreak++;
    cursor = addDays(cursor, -1);
  }

  let longestRun = 1;
  let run = 1;
  for (let i = 1; i < ascending.length; i++) {
    run = daysBetween(ascending[i - 1], ascending[i]) === 1 ? run + 1 : 1;
    longestRun = Math.max(longestRun, run);
  }

  return {
    currentStreak,
    longestStreak: Math.max(longestRun, currentStreak),
    lastActivityDate: ascending[ascending.length - 1],
  };
}

/** Recompute a user's streaks from the stored events and overwrite their row. */
export function refreshStreaks(
  activities: Pick<ActivityStore, 'transaction' | 'distinctDates'>,
  streaks: StreakStore,
  userId: string,
  today: string,
): UserStreakRow {
  return activities.transaction(() => {
    const values = calculateStreaks(activities.distinctDates(), today);
    return streaks.put(userId, values);
  });
}
