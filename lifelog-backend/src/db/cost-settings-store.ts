import { eq, isNull, ne, or, and } from 'drizzle-orm';
import type { AppDatabase } from './connection.js';
import { costSettings, type CostSettingsRow } from './schema.js';

const SETTINGS_ID = 1;

export interface CostSettingsUpdate {
  dailyCap?: number;
  notificationThreshold?: number;
}

/**
 * Singleton cost settings row. Seeded by runMigrations, so a missing row is
 * treated as a broken database rather than silently recreated.
 */
export function createCostSettingsStore(db: AppDatabase) {
  function get(): CostSettingsRow {
    const row = db.select().from(costSettings).where(eq(costSettings.id, SETTINGS_ID)).get();
    if (!row) {
      throw new Error('cost_settings row missing; run migrations first');
    }
    return row;
  }

  function update(changes: CostSettingsUpdate): CostSettingsRow {
    const row = db.update(costSettings)
      .set({ ...changes, updatedAt: new Date().toISOString() })
      .where(eq(costSettings.id, SETTINGS_ID))
      .returning()
      .get();
    if (!row) {
      throw new Error('cost_settings row missing; run migrations first');
    }
    return row;
  }

  /**
   * Record that the threshold warning went out on `date`.
   * Returns false when it was already recorded for that date.
   */
  function markWarningSent(date: string): boolean {
    const result = db.update(costSettings)
      .set({ warningSentOn: date })
      .where(and(
        eq(costSettings.id, SETTINGS_ID),
        or(isNull(costSettings.warningSentOn), ne(costSettings.warningSentOn, date)),
      ))
      .run();
    return result.changes === 1;
  }

  return { get, update, markWarningSent };
}

export type CostSettingsStore = ReturnType<typeof createCostSettingsStore>;
