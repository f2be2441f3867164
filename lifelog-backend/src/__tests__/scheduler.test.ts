import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CaptureScheduler, isWithinActiveHours, type CaptureSchedulerDeps } from '../capture/scheduler.js';
import { createCameraStatusStore, type CameraStatusStore } from '../db/camera-status-store.js';
import type { CameraConfig } from '../config.js';
import { createTestDatabase } from './helpers.js';

function camera(overrides: Partial<CameraConfig> = {}): CameraConfig {
  return {
    id: 'kitchen',
    room: 'Kitchen',
    snapshotUrl: 'http://camera.local/snapshot.jpg',
    intervalMinutes: 5,
    enabled: true,
    ...overrides,
  };
}

const at = (hhmm: string) => new Date(`2026-03-10T${hhmm}:00.000Z`);

describe('isWithinActiveHours', () => {
  it('is always active without a window', () => {
    expect(isWithinActiveHours(undefined, at('03:00'), 'UTC')).toBe(true);
  });

  it('includes the start and excludes the end of a daytime window', () => {
    const hours = { start: '07:00', end: '23:00' };
    expect(isWithinActiveHours(hours, at('07:00'), 'UTC')).toBe(true);
    expect(isWithinActiveHours(hours, at('22:59'), 'UTC')).toBe(true);
    expect(isWithinActiveHours(hours, at('23:00'), 'UTC')).toBe(false);
    expect(isWithinActiveHours(hours, at('06:59'), 'UTC')).toBe(false);
  });

  it('handles windows that wrap past midnight', () => {
    const hours = { start: '22:00', end: '06:00' };
    expect(isWithinActiveHours(hours, at('23:30'), 'UTC')).toBe(true);
    expect(isWithinActiveHours(hours, at('05:59'), 'UTC')).toBe(true);
    expect(isWithinActiveHours(hours, at('12:00'), 'UTC')).toBe(false);
  });

  it('treats equal start and end as always active', () => {
    expect(isWithinActiveHours({ start: '08:00', end: '08:00' }, at('03:00'), 'UTC')).toBe(true);
  });

  it('reads the clock in the configured time zone', () => {
    // 23:30 UTC is 08:30 the next morning in Tokyo
    expect(isWithinActiveHours({ start: '08:00', end: '09:00' }, at('23:30'), 'Asia/Tokyo')).toBe(true);
    expect(isWithinActiveHours({ start: '08:00', end: '09:00' }, at('23:30'), 'UTC')).toBe(false);
  });
});

describe('CaptureScheduler', () => {
  const NOW = at('12:00');
  const FRAME = Buffer.from('jpeg-bytes');
  let status: CameraStatusStore;

  function deps(overrides: Partial<CaptureSchedulerDeps> = {}): CaptureSchedulerDeps {
    return {
      snapshots: { fetch: async () => FRAME },
      pipeline: { process: vi.fn<CaptureSchedulerDeps['pipeline']['process']>() },
      status,
      timeZone: 'UTC',
      ...overrides,
    };
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    status = createCameraStatusStore(createTestDatabase().db);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('runOnce', () => {
    it('hands the snapshot to the pipeline and marks the camera connected', async () => {
      const capture = vi.fn<CaptureSchedulerDeps['pipeline']['process']>();
      const scheduler = new CaptureScheduler([], deps({ pipeline: { process: capture } }));
      const cam = camera();

      expect(await scheduler.runOnce(cam, NOW)).toBe('captured');
      expect(capture).toHaveBeenCalledWith(cam, FRAME, NOW);
      expect(status.get('kitchen')).toMatchObject({
        isConnected: true,
        consecutiveFailures: 0,
        lastSuccessAt: NOW.toISOString(),
      });
    });

    it('does nothing outside active hours', async () => {
      const fetch = vi.fn(async () => FRAME);
      const scheduler = new CaptureScheduler([], deps({ snapshots: { fetch } }));

      const result = await scheduler.runOnce(camera({ activeHours: { start: '07:00', end: '09:00' } }), NOW);

      expect(result).toBe('inactive');
      expect(fetch).not.toHaveBeenCalled();
      expect(status.get('kitchen')).toBeNull();
    });

    it('counts consecutive snapshot failures and resets on success', async () => {
      let fail = true;
      const snapshots = {
        fetch: async () => {
          if (fail) throw new Error('Snapshot GET kitchen failed: 503 Service Unavailable');
          return FRAME;
        },
      };
      const capture = vi.fn<CaptureSchedulerDeps['pipeline']['process']>();
      const scheduler = new CaptureScheduler([], deps({ snapshots, pipeline: { process: capture } }));

      expect(await scheduler.runOnce(camera(), NOW)).toBe('snapshot_failed');
      expect(await scheduler.runOnce(camera(), NOW)).toBe('snapshot_failed');
      expect(status.get('kitchen')).toMatchObject({
        isConnected: false,
        consecutiveFailures: 2,
        errorMessage: 'Snapshot GET kitchen failed: 503 Service Unavailable',
      });
      expect(capture).not.toHaveBeenCalled();

      fail = false;
      expect(await scheduler.runOnce(camera(), NOW)).toBe('captured');
      expect(status.get('kitchen')?.consecutiveFailures).toBe(0);
    });

    it('reports pipeline failures without rejecting', async () => {
      const capture = vi.fn<CaptureSchedulerDeps['pipeline']['process']>(async () => {
        throw new Error('SQLITE_BUSY');
      });
      const scheduler = new CaptureScheduler([], deps({ pipeline: { process: capture } }));

      expect(await scheduler.runOnce(camera(), NOW)).toBe('failed');
    });
  });

  describe('start/stop', () => {
    it('runs enabled cameras repeatedly and stops cleanly', async () => {
      const capture = vi.fn<CaptureSchedulerDeps['pipeline']['process']>();
      // 0.0002 min = 12 ms
      const scheduler = new CaptureScheduler(
        [camera({ intervalMinutes: 0.0002 }), camera({ id: 'garage', room: 'Garage', enabled: false })],
        deps({ pipeline: { process: capture } }),
      );

      scheduler.start();
      await vi.waitFor(() => expect(capture.mock.calls.length).toBeGreaterThanOrEqual(3));
      await scheduler.stop();

      const calls = capture.mock.calls.length;
      expect(capture.mock.calls.every(([cam]) => cam.id === 'kitchen')).toBe(true);
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(capture.mock.calls.length).toBe(calls);
    });

    it('never overlaps attempts for one camera', async () => {
      let active = 0;
      let maxActive = 0;
      const capture = vi.fn<CaptureSchedulerDeps['pipeline']['process']>(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 20));
        active--;
      });
      // Interval (~1 ms) is far shorter than an attempt
      const scheduler = new CaptureScheduler(
        [camera({ intervalMinutes: 0.00001 })],
        deps({ pipeline: { process: capture } }),
      );

      scheduler.start();
      await vi.waitFor(() => expect(capture.mock.calls.length).toBeGreaterThanOrEqual(3));
      await scheduler.stop();

      expect(maxActive).toBe(1);
      expect(active).toBe(0);
    });
  });
});
