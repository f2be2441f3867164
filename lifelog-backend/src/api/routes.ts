import { Router } from 'express';
import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { authMiddleware, handleLogin } from '../auth/jwt.js';
import type { AppServices } from '../services.js';
import { createActivitiesRouter } from './activities.js';
import { createAdminRouter } from './admin.js';
import { createCalendarRouter } from './calendar.js';
import { createCamerasRouter } from './cameras.js';
import { createCostRouter } from './cost.js';
import { createHealthRouter } from './health.js';
import { createStatisticsRouter } from './statistics.js';
import { createTimelineRouter } from './timeline.js';
import { validationError } from './validation.js';

export function createRouter(services: AppServices): Router {
  const router = Router();

  // Public routes (no auth required)
  router.use('/api/health', createHealthRouter(services));
  router.post('/api/auth/login', handleLogin);

  // Auth middleware for all other /api/* routes
  router.use('/api', authMiddleware);

  router.use('/api/activities', createActivitiesRouter(services));
  router.use('/api/statistics', createStatisticsRouter(services));
  router.use('/api/calendar', createCalendarRouter(services));
  router.use('/api/cost', createCostRouter(services));
  router.use('/api/cameras', createCamerasRouter(services));
  router.use('/api/admin', createAdminRouter(services));
  router.use('/api', createTimelineRouter(services));

  return router;
}

/** Last-resort handler: `{ error }` JSON instead of Express's HTML page. */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json(validationError(err));
    return;
  }
  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  console.error(`[API] ${req.method} ${req.originalUrl} failed:`, err instanceof Error ? err.message : err);
  res.status(500).json({ error: err instanceof Error ? err.message : 'Internal server error' });
};
