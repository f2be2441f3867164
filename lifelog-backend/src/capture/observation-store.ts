import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db/connection.js';
import { cameraObservations } from '../db/schema.js';
import type { BoundingBox } from '../vision/detector.js';

/** What the scene looked like the last time the camera's frame was analyzed. */
export interface ObservationState {
  cameraId: string;
  lastAnalyzedAt: Date;
  lastBbox: BoundingBox | null;
  lastFrame: Buffer;
}

export interface ObservationStateStore {
  get(cameraId: string): ObservationState | null;
  /** Replace the camera's state wholesale. */
  put(state: ObservationState): void;
}

export class MemoryObservationStore implements ObservationStateStore {
  private readonly states = new Map<string, ObservationState>();

  get(cameraId: string): ObservationState | null {
    return this.states.get(cameraId) ?? null;
  }

  put(state: ObservationState): void {
    this.states.set(state.cameraId, state);
  }
}

/** Survives restarts, so the first capture after a reboot is not treated as initial. */
export class SqliteObservationStore implements ObservationStateStore {
  constructor(private readonly db: AppDatabase) {}

  get(cameraId: string): ObservationState | null {
    const row = this.db.select().from(cameraObservations)
      .where(eq(cameraObservations.cameraId, cameraId))
      .get();
    if (!row) return null;

    const lastBbox = row.bboxX !== null && row.bboxY !== null && row.bboxWidth !== null && row.bboxHeight !== null
      ? { x: row.bboxX, y: row.bboxY, width: row.bboxWidth, height: row.bboxHeight }
      : null;

    return {
      cameraId: row.cameraId,
      lastAnalyzedAt: new Date(row.lastAnalyzedAt),
      lastBbox,
      lastFrame: row.lastFrame,
    };
  }

  put(state: ObservationState): void {
    const values = {
      lastAnalyzedAt: state.lastAnalyzedAt.toISOString(),
      bboxX: state.lastBbox?.x ?? null,
      bboxY: state.lastBbox?.y ?? null,
      bboxWidth: state.lastBbox?.width ?? null,
      bboxHeight: state.lastBbox?.height ?? null,
      lastFrame: state.lastFrame,
    };
    this.db.insert(cameraObservations)
      .values({ cameraId: state.cameraId, ...values })
      .onConflictDoUpdate({ target: cameraObservations.cameraId, set: values })
      .run();
  }
}
