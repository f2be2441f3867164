/**
 * REST API for the daily analysis budget.
 *
 * Endpoints:
 *   GET /api/cost/today
 *   GET /api/cost/settings
 *   PUT /api/cost/settings   { dailyCap?, notificationThreshold? }
 *   GET /api/cost/history?days=30
 */

import { Router } from 'express';
import { z } from 'zod';
import { costSettingsUpdateSchema } from '../cost/governor.js';
import type { AppServices } from '../services.js';
import { addDays } from '../utils/dates.js';
import { validationError } from './validation.js';

const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export function createCostRouter(services: AppServices): Router {
  const router = Router();
  const { governor, activities } = services;

  /**
   * GET /today -- current daily budget status.
   */
  router.get('/today', (_req, res) => {
    const status = governor.check();
    res.json({
      date: status.date,
      dailySpent: status.spent,
      tokens: status.tokens,
      requests: status.requests,
      dailyCap: status.dailyCap,
      notificationThreshold: status.notificationThreshold,
      remaining: status.remaining,
      percentage: Math.round(status.percentUsed * 10) / 10,
      thresholdReached: status.thresholdReached,
      capReached: status.blocked,
    });
  });

  router.get('/settings', (_req, res) => {
    const settings = governor.getSettings();
    res.json({
      dailyCap: settings.dailyCap,
      notificationThreshold: settings.notificationThreshold,
      updatedAt: settings.updatedAt,
    });
  });

  router.put('/settings', (req, res) => {
    const parsed = costSettingsUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationError(parsed.error));
      return;
    }

    const settings = governor.updateSettings(parsed.data);
    console.log(`[Cost] Settings updated: cap $${settings.dailyCap.toFixed(2)}, threshold $${settings.notificationThreshold.toFixed(2)}`);
    res.json({
      dailyCap: settings.dailyCap,
      notificationThreshold: settings.notificationThreshold,
      updatedAt: settings.updatedAt,
    });
  });

  /**
   * GET /history -- daily cost trend for the past N days.
   */
  router.get('/history', (req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json(validationError(parsed.error));
      return;
    }

    const { days } = parsed.data;
    const since = addDays(governor.today(), -(days - 1));
    res.json({ days, since, history: activities.costHistory(since) });
  });

  return router;
}
