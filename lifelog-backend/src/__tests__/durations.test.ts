/**
 * Duration inference: pure pairing rules and the stored fill/recompute passes.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createActivityStore, type ActivityStore, type TimelineEvent } from '../db/activity-store.js';
import { inferDurations, runDurationPass } from '../timeline/durations.js';
import { DataIntegrityError } from '../utils/errors.js';
import { createTestDatabase, eventRow } from './helpers.js';

const OPTIONS = { ceilingMinutes: 240 };

let nextId = 1;
function ev(timestamp: string, personLabel: string | null = 'Ava', room = 'Kitchen'): TimelineEvent {
  return { id: nextId++, timestamp, personLabel, room, durationMinutes: null };
}

describe('inferDurations', () => {
  beforeEach(() => {
    nextId = 1;
  });

  it('pairs same person and room, and stops at a room change', () => {
    const events = [
      ev('2026-03-02T09:00:00.000Z', 'Ava', 'Kitchen'),
      ev('2026-03-02T09:20:00.000Z', 'Ava', 'Kitchen'),
      ev('2026-03-02T09:25:00.000Z', 'Ava', 'Office'),
    ];

    const durations = inferDurations(events, OPTIONS);
    expect(durations.get(1)).toBe(20);
    expect(durations.get(2)).toBeNull();
    expect(durations.get(3)).toBeNull();
  });

  it('never assigns the last event a duration', () => {
    const durations = inferDurations([ev('2026-03-02T09:00:00.000Z')], OPTIONS);
    expect(durations.get(1)).toBeNull();
  });

  it('returns an empty map for no events', () => {
    expect(inferDurations([], OPTIONS).size).toBe(0);
  });

  it('truncates to whole minutes', () => {
    const durations = inferDurations([
      ev('2026-03-02T09:00:00.000Z'),
      ev('2026-03-02T09:05:59.000Z'),
    ], OPTIONS);
    expect(durations.get(1)).toBe(5);
  });

  it('requires a gap strictly between 0 and the ceiling', () => {
    const durations = inferDurations([
      ev('2026-03-02T09:00:00.000Z'),
      ev('2026-03-02T09:00:30.000Z'), // 30s truncates to 0
      ev('2026-03-02T13:00:30.000Z'), // exactly 240 min later
      ev('2026-03-02T16:59:30.000Z'), // 239 min later
      ev('2026-03-02T17:10:00.000Z'),
    ], OPTIONS);

    expect(durations.get(1)).toBeNull();
    expect(durations.get(2)).toBeNull();
    expect(durations.get(3)).toBe(239);
  });

  it('compares person labels exactly: null and "Unknown" differ', () => {
    const durations = inferDurations([
      ev('2026-03-02T09:00:00.000Z', null),
      ev('2026-03-02T09:10:00.000Z', null),
      ev('2026-03-02T09:20:00.000Z', 'Unknown'),
      ev('2026-03-02T09:30:00.000Z', 'Unknown'),
      ev('2026-03-02T09:40:00.000Z', 'Ava'),
    ], OPTIONS);

    expect(durations.get(1)).toBe(10);
    expect(durations.get(2)).toBeNull();
    expect(durations.get(3)).toBe(10);
    expect(durations.get(4)).toBeNull();
  });

  it('throws DataIntegrityError on out-of-order timestamps', () => {
    const events = [
      ev('2026-03-02T09:20:00.000Z'),
      ev('2026-03-02T09:00:00.000Z'),
    ];
    expect(() => inferDurations(events, OPTIONS)).toThrow(DataIntegrityError);
  });
});

describe('runDurationPass', () => {
  let store: ActivityStore;

  beforeEach(() => {
    store = createActivityStore(createTestDatabase().db);
  });

  function durationsById(): Record<number, number | null> {
    return Object.fromEntries(store.listChronological().map((e) => [e.id, e.durationMinutes]));
  }

  it('fills null durations and is a no-op when repeated', () => {
    const a = store.insert(eventRow({ timestamp: '2026-03-02T09:00:00.000Z', personLabel: 'Ava' }));
    const b = store.insert(eventRow({ timestamp: '2026-03-02T09:20:00.000Z', personLabel: 'Ava' }));
    const c = store.insert(eventRow({ timestamp: '2026-03-02T09:25:00.000Z', personLabel: 'Ava', room: 'Office' }));

    const first = runDurationPass(store, 'fill', OPTIONS);
    expect(first).toEqual({ mode: 'fill', examined: 3, updated: 1 });
    expect(durationsById()).toEqual({ [a.id]: 20, [b.id]: null, [c.id]: null });

    const second = runDurationPass(store, 'fill', OPTIONS);
    expect(second.updated).toBe(0);
    expect(durationsById()).toEqual({ [a.id]: 20, [b.id]: null, [c.id]: null });
  });

  it('fill keeps durations that are already set', () => {
    const a = store.insert(eventRow({ timestamp: '2026-03-02T09:00:00.000Z', durationMinutes: 99 }));
    store.insert(eventRow({ timestamp: '2026-03-02T09:20:00.000Z' }));

    runDurationPass(store, 'fill', OPTIONS);
    expect(store.getById(a.id)?.durationMinutes).toBe(99);
  });

  it('fills an earlier event once its successor arrives', () => {
    const a = store.insert(eventRow({ timestamp: '2026-03-02T09:00:00.000Z' }));
    runDurationPass(store, 'fill', OPTIONS);
    expect(store.getById(a.id)?.durationMinutes).toBeNull();

    store.insert(eventRow({ timestamp: '2026-03-02T09:15:00.000Z' }));
    runDurationPass(store, 'fill', OPTIONS);
    expect(store.getById(a.id)?.durationMinutes).toBe(15);
  });

  it('recompute rewrites stale durations after a person is tagged', () => {
    const a = store.insert(eventRow({ timestamp: '2026-03-02T09:00:00.000Z', personLabel: 'Unknown' }));
    const b = store.insert(eventRow({ timestamp: '2026-03-02T09:20:00.000Z', personLabel: 'Unknown' }));
    runDurationPass(store, 'fill', OPTIONS);
    expect(store.getById(a.id)?.durationMinutes).toBe(20);

    store.tagPerson(b.id, 'Ava');

    // fill leaves the now-stale value alone
    runDurationPass(store, 'fill', OPTIONS);
    expect(store.getById(a.id)?.durationMinutes).toBe(20);

    const result = runDurationPass(store, 'recompute', OPTIONS);
    expect(result.updated).toBe(1);
    expect(store.getById(a.id)?.durationMinutes).toBeNull();
  });
});
