import { eq } from 'drizzle-orm';
import type { AppDatabase } from './connection.js';
import { userStreaks, type UserStreakRow } from './schema.js';

export interface StreakValues {
  currentStreak: number;
  longestStreak: number;
  lastActivityDate: string | null;
}

export function createStreakStore(db: AppDatabase) {
  function get(userId: string): UserStreakRow | null {
    return db.select().from(userStreaks).where(eq(userStreaks.userId, userId)).get() ?? null;
  }

  /** Overwrite the user's streak row (insert on first write). */
  function put(userId: string, values: StreakValues): UserStreakRow {
    const row = { ...values, updatedAt: new Date().toISOString() };
    return db.insert(userStreaks)
      .values({ userId, ...row })
      .onConflictDoUpdate({ target: userStreaks.userId, set: row })
      .returning()
      .get();
  }

  return { get, put };
}

export type StreakStore = ReturnType<typeof createStreakStore>;
