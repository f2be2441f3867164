/**
 * Streak calculation and the stored per-user streak row.
 */

import { describe, it, expect } from 'vitest';
import { createActivityStore } from '../db/activity-store.js';
import { createStreakStore } from '../db/streak-store.js';
import { calculateStreaks, refreshStreaks } from '../timeline/streaks.js';
import { createTestDatabase, eventRow } from './helpers.js';

const TODAY = '2026-03-10';

describe('calculateStreaks', () => {
  it('counts a run ending today', () => {
    expect(calculateStreaks(['2026-03-10', '2026-03-09', '2026-03-08'], TODAY)).toEqual({
      currentStreak: 3,
      longestStreak: 3,
      lastActivityDate: '2026-03-10',
    });
  });

  it('has no current streak when the last activity is five days old', () => {
    expect(calculateStreaks(['2026-03-05'], TODAY)).toEqual({
      currentStreak: 0,
      longestStreak: 1,
      lastActivityDate: '2026-03-05',
    });
  });

  it('returns zeros for no activity', () => {
    expect(calculateStreaks([], TODAY)).toEqual({
      currentStreak: 0,
      longestStreak: 0,
      lastActivityDate: null,
    });
  });

  it('keeps the streak alive when only yesterday is active so far', () => {
    const result = calculateStreaks(['2026-03-09', '2026-03-08'], TODAY);
    expect(result.currentStreak).toBe(2);
    expect(result.longestStreak).toBe(2);
  });

  it('finds a longer run in the past', () => {
    const result = calculateStreaks(
      ['2026-03-09', '2026-03-04', '2026-03-03', '2026-03-02', '2026-03-01'],
      TODAY,
    );
    expect(result.currentStreak).toBe(1);
    expect(result.longestStreak).toBe(4);
  });

  it('ignores duplicate and unsorted dates', () => {
    const result = calculateStreaks(['2026-03-08', '2026-03-10', '2026-03-09', '2026-03-10'], TODAY);
    expect(result.currentStreak).toBe(3);
    expect(result.longestStreak).toBe(3);
  });

  it('counts runs across a month boundary', () => {
    const result = calculateStreaks(['2026-02-28', '2026-03-01'], '2026-03-01');
    expect(result.currentStreak).toBe(2);
  });
});

describe('refreshStreaks', () => {
  it('overwrites the user row from stored events', () => {
    const { db } = createTestDatabase();
    const activities = createActivityStore(db);
    const streaks = createStreakStore(db);

    activities.insert(eventRow({ timestamp: '2026-03-09T09:00:00.000Z' }));
    activities.insert(eventRow({ timestamp: '2026-03-10T09:00:00.000Z' }));

    const first = refreshStreaks(activities, streaks, 'operator', TODAY);
    expect(first.currentStreak).toBe(2);
    expect(first.longestStreak).toBe(2);
    expect(first.lastActivityDate).toBe('2026-03-10');

    // Two days later with nothing new: current drops, longest stays derived
    const later = refreshStreaks(activities, streaks, 'operator', '2026-03-12');
    expect(later.currentStreak).toBe(0);
    expect(later.longestStreak).toBe(2);
    expect(streaks.get('operator')?.currentStreak).toBe(0);
  });

  it('writes zeros when there are no events', () => {
    const { db } = createTestDatabase();
    const row = refreshStreaks(createActivityStore(db), createStreakStore(db), 'operator', TODAY);
    expect(row.currentStreak).toBe(0);
    expect(row.longestStreak).toBe(0);
    expect(row.lastActivityDate).toBeNull();
  });
});
