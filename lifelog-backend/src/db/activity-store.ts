import { and, asc, count, desc, eq, gte, isNotNull, like, lte, ne, or, sql, type SQL } from 'drizzle-orm';
import type { AppDatabase } from './connection.js';
import {
  SKIPPED_ACTIVITY,
  captureEvents,
  type ActivityCategory,
  type CaptureEventRow,
  type NewCaptureEvent,
} from './schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One end of a time range: a calendar date matches on `capturedOn` (whole day,
 * configured zone), an instant matches on the UTC timestamp.
 */
export type TimeBound =
  | { kind: 'date'; value: string }
  | { kind: 'instant'; value: string };

export interface ActivityFilters {
  cameraId?: string;
  room?: string;
  category?: ActivityCategory;
  personLabel?: string;
  from?: TimeBound;
  to?: TimeBound;
  search?: string;
  limit?: number;
  offset?: number;
}

/** The slice of a capture event the duration pass needs. */
export interface TimelineEvent {
  id: number;
  timestamp: string;
  personLabel: string | null;
  room: string;
  durationMinutes: number | null;
}

export interface DurationUpdate {
  id: number;
  durationMinutes: number | null;
}

export interface SpendTotals {
  cost: number;
  tokens: number;
  requests: number;
}

export interface DailyCost extends SpendTotals {
  date: string;
  skipped: number;
}

export interface ActivitySummary {
  total: number;
  analyzed: number;
  skipped: number;
  totalCost: number;
  byRoom: Array<{ room: string; count: number }>;
  byCamera: Array<{ cameraId: string; count: number }>;
  /** Ten most frequent activity descriptions, skipped rows excluded */
  byActivity: Array<{ activity: string | null; count: number }>;
  byCategory: Array<{ category: string | null; count: number; totalMinutes: number }>;
  bySkipReason: Array<{ skipReason: string | null; count: number }>;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export function createActivityStore(db: AppDatabase) {
  function buildFilter(filters: ActivityFilters): SQL | undefined {
    const conditions: SQL[] = [];
    if (filters.cameraId) conditions.push(eq(captureEvents.cameraId, filters.cameraId));
    if (filters.room) conditions.push(eq(captureEvents.room, filters.room));
    if (filters.category) conditions.push(eq(captureEvents.category, filters.category));
    if (filters.personLabel) conditions.push(eq(captureEvents.personLabel, filters.personLabel));
    if (filters.from) {
      const column = filters.from.kind === 'date' ? captureEvents.capturedOn : captureEvents.timestamp;
      conditions.push(gte(column, filters.from.value));
    }
    if (filters.to) {
      const column = filters.to.kind === 'date' ? captureEvents.capturedOn : captureEvents.timestamp;
      conditions.push(lte(column, filters.to.value));
    }
    if (filters.search) {
      const pattern = `%${filters.search}%`;
      const match = or(
        like(captureEvents.activity, pattern),
        like(captureEvents.details, pattern),
        like(captureEvents.room, pattern),
      );
      if (match) conditions.push(match);
    }
    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  function insert(event: NewCaptureEvent): CaptureEventRow {
    return db.insert(captureEvents).values(event).returning().get();
  }

  function getById(id: number): CaptureEventRow | null {
    return db.select().from(captureEvents).where(eq(captureEvents.id, id)).get() ?? null;
  }

  function list(filters: ActivityFilters = {}): { activities: CaptureEventRow[]; total: number } {
    const where = buildFilter(filters);
    const activities = db.select().from(captureEvents)
      .where(where)
      .orderBy(desc(captureEvents.timestamp), desc(captureEvents.id))
      .limit(filters.limit ?? 100)
      .offset(filters.offset ?? 0)
      .all();
    const total = db.select({ value: count() }).from(captureEvents).where(where).get()?.value ?? 0;
    return { activities, total };
  }

  /** Every event in ascending time order (ties broken by insertion order). */
  function listChronological(): TimelineEvent[] {
    return db.select({
      id: captureEvents.id,
      timestamp: captureEvents.timestamp,
      personLabel: captureEvents.personLabel,
      room: captureEvents.room,
      durationMinutes: captureEvents.durationMinutes,
    })
      .from(captureEvents)
      .orderBy(asc(captureEvents.timestamp), asc(captureEvents.id))
      .all();
  }

  function listSince(since: string): CaptureEventRow[] {
    return db.select().from(captureEvents)
      .where(gte(captureEvents.timestamp, since))
      .orderBy(asc(captureEvents.timestamp), asc(captureEvents.id))
      .all();
  }

  /** Events whose calendar date falls in [fromDate, toDate], oldest first. */
  function listBetweenDates(fromDate: string, toDate: string): CaptureEventRow[] {
    return db.select().from(captureEvents)
      .where(and(gte(captureEvents.capturedOn, fromDate), lte(captureEvents.capturedOn, toDate)))
      .orderBy(asc(captureEvents.timestamp), asc(captureEvents.id))
      .all();
  }

  function timestampsSince(since: string): string[] {
    return db.select({ timestamp: captureEvents.timestamp })
      .from(captureEvents)
      .where(gte(captureEvents.timestamp, since))
      .orderBy(asc(captureEvents.timestamp))
      .all()
      .map((r) => r.timestamp);
  }

  function setDurations(updates: DurationUpdate[]): number {
    let changed = 0;
    for (const u of updates) {
      const result = db.update(captureEvents)
        .set({ durationMinutes: u.durationMinutes })
        .where(eq(captureEvents.id, u.id))
        .run();
      changed += result.changes;
    }
    return changed;
  }

  function tagPerson(id: number, personLabel: string | null): CaptureEventRow | null {
    return db.update(captureEvents)
      .set({ personLabel })
      .where(eq(captureEvents.id, id))
      .returning()
      .get() ?? null;
  }

  /** Distinct calendar dates with at least one event, newest first. */
  function distinctDates(): string[] {
    return db.selectDistinct({ date: captureEvents.capturedOn })
      .from(captureEvents)
      .orderBy(desc(captureEvents.capturedOn))
      .all()
      .map((r) => r.date);
  }

  /** Spend on or after a calendar date; a request is a row that got a paid analysis. */
  function spendSince(date: string): SpendTotals {
    const row = db.select({
      cost: sql<number>`COALESCE(SUM(${captureEvents.cost}), 0)`,
      tokens: sql<number>`COALESCE(SUM(${captureEvents.tokensUsed}), 0)`,
      requests: sql<number>`COUNT(CASE WHEN ${captureEvents.analysisSkipped} = 0 THEN 1 END)`,
    })
      .from(captureEvents)
      .where(gte(captureEvents.capturedOn, date))
      .get();
    return { cost: row?.cost ?? 0, tokens: row?.tokens ?? 0, requests: row?.requests ?? 0 };
  }

  function costHistory(sinceDate: string): DailyCost[] {
    return db.select({
      date: captureEvents.capturedOn,
      cost: sql<number>`COALESCE(SUM(${captureEvents.cost}), 0)`,
      tokens: sql<number>`COALESCE(SUM(${captureEvents.tokensUsed}), 0)`,
      requests: sql<number>`COUNT(CASE WHEN ${captureEvents.analysisSkipped} = 0 THEN 1 END)`,
      skipped: sql<number>`COUNT(CASE WHEN ${captureEvents.analysisSkipped} = 1 THEN 1 END)`,
    })
      .from(captureEvents)
      .where(gte(captureEvents.capturedOn, sinceDate))
      .groupBy(captureEvents.capturedOn)
      .orderBy(desc(captureEvents.capturedOn))
      .all();
  }

  function summary(sinceDate: string): ActivitySummary {
    const since = gte(captureEvents.capturedOn, sinceDate);

    const totals = db.select({
      total: count(),
      skipped: sql<number>`COUNT(CASE WHEN ${captureEvents.analysisSkipped} = 1 THEN 1 END)`,
      totalCost: sql<number>`COALESCE(SUM(${captureEvents.cost}), 0)`,
    }).from(captureEvents).where(since).get();

    const byRoom = db.select({ room: captureEvents.room, count: count() })
      .from(captureEvents)
      .where(since)
      .groupBy(captureEvents.room)
      .orderBy(desc(count()))
      .all();

    const byCamera = db.select({ cameraId: captureEvents.cameraId, count: count() })
      .from(captureEvents)
      .where(since)
      .groupBy(captureEvents.cameraId)
      .orderBy(desc(count()))
      .all();

    const byActivity = db.select({ activity: captureEvents.activity, count: count() })
      .from(captureEvents)
      .where(and(
        since,
        isNotNull(captureEvents.activity),
        ne(captureEvents.activity, ''),
        ne(captureEvents.activity, SKIPPED_ACTIVITY),
      ))
      .groupBy(captureEvents.activity)
      .orderBy(desc(count()), asc(captureEvents.activity))
      .limit(10)
      .all();

    const byCategory = db.select({
      category: captureEvents.category,
      count: count(),
      totalMinutes: sql<number>`COALESCE(SUM(${captureEvents.durationMinutes}), 0)`,
    })
      .from(captureEvents)
      .where(and(since, isNotNull(captureEvents.category)))
      .groupBy(captureEvents.category)
      .orderBy(desc(count()))
      .all();

    const bySkipReason = db.select({ skipReason: captureEvents.skipReason, count: count() })
      .from(captureEvents)
      .where(and(since, eq(captureEvents.analysisSkipped, true)))
      .groupBy(captureEvents.skipReason)
      .orderBy(desc(count()))
      .all();

    const total = totals?.total ?? 0;
    const skipped = totals?.skipped ?? 0;
    return {
      total,
      analyzed: total - skipped,
      skipped,
      totalCost: totals?.totalCost ?? 0,
      byRoom,
      byCamera,
      byActivity,
      byCategory,
      bySkipReason,
    };
  }

  /** Path of the camera's most recently archived frame. */
  function latestImagePath(cameraId: string): string | null {
    const row = db.select({ imagePath: captureEvents.imagePath })
      .from(captureEvents)
      .where(and(eq(captureEvents.cameraId, cameraId), isNotNull(captureEvents.imagePath)))
      .orderBy(desc(captureEvents.timestamp), desc(captureEvents.id))
      .limit(1)
      .get();
    return row?.imagePath ?? null;
  }


  /** Bulk administrative reset. Returns the number of rows removed. */
  function reset(): number {
    return db.delete(captureEvents).run().changes;
  }

  /** Run `fn` inside one SQLite transaction (consistent snapshot, single writer). */
  function transaction<T>(fn: () => T): T {
    return db.transaction(() => fn());
  }

  return {
    insert,
    getById,
    list,
    listChronological,
    listSince,
    listBetweenDates,
    timestampsSince,
    setDurations,
    tagPerson,
    distinctDates,
    spendSince,
    costHistory,
    summary,
    latestImagePath,
    reset,
    transaction,
  };
}

export type ActivityStore = ReturnType<typeof createActivityStore>;
