import { Router } from 'express';
import type { AppServices } from '../services.js';

/**
 * DELETE /api/admin/activities -- remove every capture event and reset the
 * derived streak. Requires `?confirm=true`.
 */
export function createAdminRouter(services: AppServices): Router {
  const router = Router();

  router.delete('/activities', (req, res) => {
    if (req.query.confirm !== 'true') {
      res.status(400).json({ error: 'Pass confirm=true to delete all activities' });
      return;
    }

    const deleted = services.activities.reset();
    const { streak } = services.maintenance.refresh('recompute');
    console.warn(`[Admin] Deleted ${deleted} capture events`);
    res.json({ deleted, streak });
  });

  return router;
}
