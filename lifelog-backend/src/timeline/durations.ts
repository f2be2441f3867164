/**
 * Duration inference: how long each captured activity lasted.
 *
 * Each event is compared with its chronological successor. The event's
 * duration is the gap in whole minutes (truncated) when the gap is strictly
 * between 0 and the ceiling, the person label matches exactly and the room
 * matches exactly. Otherwise, and for the last event, it stays null.
 *
 * Person labels compare as-is: null and "Unknown" are different people.
 */

import type { ActivityStore, DurationUpdate, TimelineEvent } from '../db/activity-store.js';
import { DataIntegrityError } from '../utils/errors.js';

export interface DurationOptions {
  ceilingMinutes: number;
}

export type DurationPassMode = 'fill' | 'recompute';

export interface DurationPassResult {
  mode: DurationPassMode;
  examined: number;
  updated: number;
}

const MS_PER_MINUTE = 60_000;

/**
 * Duration for every event id (null where no duration applies).
 * Throws DataIntegrityError when the events are not in ascending time order.
 */
export function inferDurations(events: TimelineEvent[], options: DurationOptions): Map<number, number | null> {
  const durations = new Map<number, number | null>();

  for (let i = 0; i < events.length; i++) {
    const current = events[i];
    const currentMs = Date.parse(current.timestamp);
    if (Number.isNaN(currentMs)) {
      throw new DataIntegrityError(`Event ${current.id} has an unparseable timestamp: ${current.timestamp}`);
    }

    const next = events[i + 1];
    if (!next) {
      durations.set(current.id, null);
      break;
    }

    const nextMs = Date.parse(next.timestamp);
    if (Number.isNaN(nextMs) || nextMs < currentMs) {
      throw new DataIntegrityError(
        `Events out of order: ${next.id} (${next.timestamp}) follows ${current.id} (${current.timestamp})`,
      );
    }

    const minutes = Math.trunc((nextMs - currentMs) / MS_PER_MINUTE);
    const qualifies = minutes > 0
      && minutes < options.ceilingMinutes
      && current.personLabel === next.personLabel
      && current.room === next.room;

    durations.set(current.id, qualifies ? minutes : null);
  }

  return durations;
}

/**
 * Run inference over the whole stored timeline inside one transaction.
 *
 * `fill` only writes events whose duration is still null, so re-running it is
 * a no-op. `recompute` rewrites every event, clearing durations that no longer
 * qualify (e.g. after a person tag changed).
 */
export function runDurationPass(
  store: Pick<ActivityStore, 'transaction' | 'listChronological' | 'setDurations'>,
  mode: DurationPassMode,
  options: DurationOptions,
): DurationPassResult {
  return store.transaction(() => {
    const events = store.listChronological();
    const computed = inferDurations(events, options);

    const updates: DurationUpdate[] = [];
    for (const event of events) {
      const minutes = computed.get(event.id) ?? null;
      if (mode === 'fill') {
        if (event.durationMinutes === null && minutes !== null) {
          updates.push({ id: event.id, durationMinutes: minutes });
        }
      } else if (event.durationMinutes !== minutes) {
        updates.push({ id: event.id, durationMinutes: minutes });
      }
    }

    const updated = store.setDurations(updates);
    return { mode, examined: events.length, updated };
  });
}
