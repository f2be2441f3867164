/**
 * Cost governor: budget evaluation (pure) and the stored settings/spend.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { createActivityStore, type ActivityStore } from '../db/activity-store.js';
import { createCostSettingsStore } from '../db/cost-settings-store.js';
import { CostGovernor, evaluateBudget } from '../cost/governor.js';
import { createTestDatabase, eventRow } from './helpers.js';

const SETTINGS = { dailyCap: 2.0, notificationThreshold: 1.5 };

function spend(cost: number) {
  return { cost, tokens: 0, requests: 0 };
}

describe('evaluateBudget', () => {
  it('blocks when spend equals the cap exactly', () => {
    const status = evaluateBudget('2026-03-10', spend(2.0), SETTINGS);
    expect(status.blocked).toBe(true);
    expect(status.remaining).toBe(0);
    expect(status.percentUsed).toBe(100);
  });

  it('allows spend just below the cap', () => {
    expect(evaluateBudget('2026-03-10', spend(1.99), SETTINGS).blocked).toBe(false);
  });

  it('reports the threshold independently of blocking', () => {
    const status = evaluateBudget('2026-03-10', spend(1.5), SETTINGS);
    expect(status.thresholdReached).toBe(true);
    expect(status.blocked).toBe(false);
    expect(evaluateBudget('2026-03-10', spend(1.49), SETTINGS).thresholdReached).toBe(false);
  });

  it('computes remaining budget and percentage', () => {
    const status = evaluateBudget('2026-03-10', spend(0.5), SETTINGS);
    expect(status.remaining).toBe(1.5);
    expect(status.percentUsed).toBe(25);
  });

  it('treats a zero cap as always blocked', () => {
    const status = evaluateBudget('2026-03-10', spend(0), { dailyCap: 0, notificationThreshold: 0 });
    expect(status.blocked).toBe(true);
    expect(status.percentUsed).toBe(100);
  });
});

describe('CostGovernor', () => {
  const NOW = new Date('2026-03-10T12:00:00.000Z');
  let activities: ActivityStore;
  let governor: CostGovernor;

  beforeEach(() => {
    const { db } = createTestDatabase();
    activities = createActivityStore(db);
    governor = new CostGovernor(activities, createCostSettingsStore(db), 'UTC');
  });

  it('starts from the seeded default settings', () => {
    const settings = governor.getSettings();
    expect(settings.dailyCap).toBe(2.0);
    expect(settings.notificationThreshold).toBe(1.5);
  });

  it('sums only today\'s events', () => {
    activities.insert(eventRow({ timestamp: '2026-03-09T23:00:00.000Z', cost: 1.0 }));
    activities.insert(eventRow({ timestamp: '2026-03-10T08:00:00.000Z', cost: 1.0 }));

    const status = governor.check(NOW);
    expect(status.date).toBe('2026-03-10');
    expect(status.spent).toBe(1.0);
    expect(status.blocked).toBe(false);
  });

  it('blocks once today\'s spend reaches the cap', () => {
    activities.insert(eventRow({ timestamp: '2026-03-10T08:00:00.000Z', cost: 1.0 }));
    activities.insert(eventRow({ timestamp: '2026-03-10T09:00:00.000Z', cost: 1.0 }));

    const status = governor.check(NOW);
    expect(status.spent).toBe(2.0);
    expect(status.blocked).toBe(true);
    expect(status.requests).toBe(2);
  });

  it('uses the configured time zone for "today"', () => {
    const tokyo = new CostGovernor(activities, createCostSettingsStore(createTestDatabase().db), 'Asia/Tokyo');
    // 20:00 UTC on the 10th is already the 11th in Tokyo
    expect(tokyo.today(new Date('2026-03-10T20:00:00.000Z'))).toBe('2026-03-11');
  });

  it('hands out the threshold warning once per day', () => {
    expect(governor.claimThresholdWarning('2026-03-10')).toBe(true);
    expect(governor.claimThresholdWarning('2026-03-10')).toBe(false);
    expect(governor.claimThresholdWarning('2026-03-11')).toBe(true);
  });

  it('updates settings', () => {
    governor.updateSettings({ dailyCap: 5 });
    const status = governor.check(NOW);
    expect(status.dailyCap).toBe(5);
    expect(status.notificationThreshold).toBe(1.5);
  });

  it('rejects invalid settings', () => {
    expect(() => governor.updateSettings({ dailyCap: -1 })).toThrow(ZodError);
    expect(() => governor.updateSettings({})).toThrow(ZodError);
  });
});
