/**
 * Shared fixtures: an in-memory, migrated database and capture event rows.
 */

import { openDatabase, type DatabaseHandle } from '../db/connection.js';
import { runMigrations } from '../db/migrate.js';
import type { NewCaptureEvent } from '../db/schema.js';

export function createTestDatabase(): DatabaseHandle {
  const handle = openDatabase(':memory:');
  runMigrations(handle.sqlite, { dailyCap: 2.0, notificationThreshold: 1.5 });
  return handle;
}

/** An analyzed kitchen event; capturedOn defaults to the UTC date of the timestamp. */
export function eventRow(overrides: Partial<NewCaptureEvent> & { timestamp: string }): NewCaptureEvent {
  return {
    cameraId: 'kitchen',
    room: 'Kitchen',
    capturedOn: overrides.timestamp.slice(0, 10),
    activity: 'Cooking dinner at stove',
    category: 'Other',
    personLabel: 'Unknown',
    personDetected: true,
    detectionConfidence: 0.9,
    analysisSkipped: false,
    tokensUsed: 100,
    cost: 0.0001,
    ...overrides,
  };
}
