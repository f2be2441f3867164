/**
 * Per-camera capture loops.
 *
 * Each enabled camera gets its own timer chain. The next attempt is scheduled
 * only after the current one finishes, so attempts for one camera never
 * overlap; an attempt that overruns its interval delays the next one.
 * Outside a camera's active hours the attempt is not run at all.
 */

import type { ActiveHours, CameraConfig } from '../config.js';
import type { CameraStatusStore } from '../db/camera-status-store.js';
import { minutesOfDay } from '../utils/dates.js';
import { errorMessage } from '../utils/errors.js';
import type { SnapshotSource } from './snapshot.js';

export type AttemptResult = 'captured' | 'inactive' | 'snapshot_failed' | 'failed';

export interface CaptureSchedulerDeps {
  snapshots: SnapshotSource;
  /** Anything that consumes a frame; the result is not used here */
  pipeline: { process(camera: CameraConfig, frame: Buffer, now: Date): Promise<unknown> };
  status: Pick<CameraStatusStore, 'recordSuccess' | 'recordFailure'>;
  timeZone: string;
}

function parseClock(hhmm: string): number {
  const [h, m] = hhmm.split(':').map((part) => parseInt(part, 10));
  return h * 60 + m;
}

/** Whether `now` falls in the window; windows may wrap past midnight (22:00-06:00). */
export function isWithinActiveHours(hours: ActiveHours | undefined, now: Date, timeZone: string): boolean {
  if (!hours) return true;
  const start = parseClock(hours.start);
  const end = parseClock(hours.end);
  const minute = minutesOfDay(now, timeZone);
  if (start === end) return true;
  return start < end
    ? minute >= start && minute < end
    : minute >= start || minute < end;
}

export class CaptureScheduler {
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private running = false;

  constructor(
    private readonly cameras: CameraConfig[],
    private readonly deps: CaptureSchedulerDeps,
  ) {}

  start(): void {
    if (this.running) {
      console.warn('[Scheduler] Already running');
      return;
    }
    this.running = true;

    const active = this.cameras.filter((c) => c.enabled);
    for (const camera of active) {
      this.schedule(camera, 0);
      console.log(`[Scheduler] ${camera.id} (${camera.room}) every ${camera.intervalMinutes} min`);
    }
    if (active.length === 0) {
      console.warn('[Scheduler] No enabled cameras configured');
    }
  }

  /** Stop scheduling and wait for attempts already running. */
  async stop(): Promise<void> {
    this.running = false;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    await Promise.all(this.inFlight.values());
    console.log('[Scheduler] Stopped');
  }

  /** One attempt for one camera. Never rejects for snapshot or pipeline failures. */
  async runOnce(camera: CameraConfig, now: Date = new Date()): Promise<AttemptResult> {
    if (!isWithinActiveHours(camera.activeHours, now, this.deps.timeZone)) {
      return 'inactive';
    }

    let frame: Buffer;
    try {
      frame = await this.deps.snapshots.fetch(camera);
    } catch (err) {
      const message = errorMessage(err);
      const status = this.deps.status.recordFailure(camera.id, now, message);
      console.error(`[Scheduler] ${camera.id}: snapshot failed (${status.consecutiveFailures} in a row): ${message}`);
      return 'snapshot_failed';
    }
    this.deps.status.recordSuccess(camera.id, now);

    try {
      await this.deps.pipeline.process(camera, frame, now);
      return 'captured';
    } catch (err) {
      console.error(`[Scheduler] ${camera.id}: capture failed:`, errorMessage(err));
      return 'failed';
    }
  }

  private schedule(camera: CameraConfig, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(camera.id);
      const started = Date.now();
      const attempt = this.runOnce(camera)
        .then(() => undefined, (err: unknown) => {
          console.error(`[Scheduler] ${camera.id}: attempt crashed:`, errorMessage(err));
        })
        .finally(() => {
          this.inFlight.delete(camera.id);
          if (this.running) {
            const intervalMs = camera.intervalMinutes * 60_000;
            this.schedule(camera, Math.max(0, intervalMs - (Date.now() - started)));
          }
        });
      this.inFlight.set(camera.id, attempt);
    }, delayMs);
    this.timers.set(camera.id, timer);
  }
}
