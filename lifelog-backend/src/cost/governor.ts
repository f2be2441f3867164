/**
 * Daily budget for paid vision analysis.
 *
 * Spend is the summed cost of every capture event dated today (in the
 * configured time zone). Analysis is blocked once spend reaches the cap;
 * the notification threshold is reported separately and never blocks.
 */

import { z } from 'zod';
import type { ActivityStore, SpendTotals } from '../db/activity-store.js';
import type { CostSettingsStore } from '../db/cost-settings-store.js';
import type { CostSettingsRow } from '../db/schema.js';
import { toCalendarDate } from '../utils/dates.js';

export interface BudgetSettings {
  dailyCap: number;
  notificationThreshold: number;
}

export interface BudgetStatus {
  date: string;
  spent: number;
  tokens: number;
  requests: number;
  dailyCap: number;
  notificationThreshold: number;
  remaining: number;
  percentUsed: number;
  /** spent >= dailyCap */
  blocked: boolean;
  /** spent >= notificationThreshold */
  thresholdReached: boolean;
}

export const costSettingsUpdateSchema = z.object({
  dailyCap: z.number().finite().nonnegative().optional(),
  notificationThreshold: z.number().finite().nonnegative().optional(),
}).refine((v) => v.dailyCap !== undefined || v.notificationThreshold !== undefined, {
  message: 'dailyCap or notificationThreshold is required',
});

export function evaluateBudget(date: string, spend: SpendTotals, settings: BudgetSettings): BudgetStatus {
  const { dailyCap, notificationThreshold } = settings;
  return {
    date,
    spent: spend.cost,
    tokens: spend.tokens,
    requests: spend.requests,
    dailyCap,
    notificationThreshold,
    remaining: Math.max(0, dailyCap - spend.cost),
    percentUsed: dailyCap > 0 ? (spend.cost / dailyCap) * 100 : 100,
    blocked: spend.cost >= dailyCap,
    thresholdReached: spend.cost >= notificationThreshold,
  };
}

export class CostGovernor {
  constructor(
    private readonly activities: Pick<ActivityStore, 'transaction' | 'spendSince'>,
    private readonly settings: CostSettingsStore,
    private readonly timeZone: string,
  ) {}

  today(now: Date = new Date()): string {
    return toCalendarDate(now, this.timeZone);
  }

  /** Settings and today's spend, read in one transaction. */
  check(now: Date = new Date()): BudgetStatus {
    const date = this.today(now);
    return this.activities.transaction(() => {
      const settings = this.settings.get();
      return evaluateBudget(date, this.activities.spendSince(date), settings);
    });
  }

  /** True exactly once per day: the first caller after the threshold is reached. */
  claimThresholdWarning(date: string): boolean {
    return this.settings.markWarningSent(date);
  }

  getSettings(): CostSettingsRow {
    return this.settings.get();
  }

  updateSettings(input: unknown): CostSettingsRow {
    const parsed = costSettingsUpdateSchema.parse(input);
    return this.settings.update(parsed);
  }
}
