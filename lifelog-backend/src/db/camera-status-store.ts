import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from './connection.js';
import { cameraStatus, type CameraStatusRow } from './schema.js';

export function createCameraStatusStore(db: AppDatabase) {
  function get(cameraId: string): CameraStatusRow | null {
    return db.select().from(cameraStatus).where(eq(cameraStatus.cameraId, cameraId)).get() ?? null;
  }

  function list(): CameraStatusRow[] {
    return db.select().from(cameraStatus).orderBy(asc(cameraStatus.cameraId)).all();
  }

  function recordSuccess(cameraId: string, at: Date): CameraStatusRow {
    const iso = at.toISOString();
    const values = {
      isConnected: true,
      lastSuccessAt: iso,
      consecutiveFailures: 0,
      errorMessage: null,
      updatedAt: iso,
    };
    return db.insert(cameraStatus)
      .values({ cameraId, ...values })
      .onConflictDoUpdate({ target: cameraStatus.cameraId, set: values })
      .returning()
      .get();
  }

  function recordFailure(cameraId: string, at: Date, message: string): CameraStatusRow {
    const iso = at.toISOString();
    const failures = (get(cameraId)?.consecutiveFailures ?? 0) + 1;
    const values = {
      isConnected: false,
      lastFailureAt: iso,
      consecutiveFailures: failures,
      errorMessage: message,
      updatedAt: iso,
    };
    return db.insert(cameraStatus)
      .values({ cameraId, ...values })
      .onConflictDoUpdate({ target: cameraStatus.cameraId, set: values })
      .returning()
      .get();
  }

  return { get, list, recordSuccess, recordFailure };
}

export type CameraStatusStore = ReturnType<typeof createCameraStatusStore>;
