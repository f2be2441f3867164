/**
 * REST API for configured cameras.
 *
 * Endpoints:
 *   GET /api/cameras
 *   GET /api/cameras/status
 *   GET /api/cameras/:cameraId/snapshot   latest archived frame (image/jpeg)
 */

import { Router } from 'express';
import { resolve } from 'node:path';
import type { AppServices } from '../services.js';

export function createCamerasRouter(services: AppServices): Router {
  const router = Router();
  const { cameras, cameraStatus, activities } = services;

  router.get('/', (_req, res) => {
    res.json({
      cameras: cameras.map((c) => ({
        id: c.id,
        name: c.name ?? c.id,
        room: c.room,
        intervalMinutes: c.intervalMinutes,
        activeHours: c.activeHours ?? null,
        enabled: c.enabled,
      })),
    });
  });

  router.get('/status', (_req, res) => {
    const statuses = new Map(cameraStatus.list().map((s) => [s.cameraId, s]));
    const result = cameras.map((c) => {
      const status = statuses.get(c.id);
      return {
        id: c.id,
        room: c.room,
        enabled: c.enabled,
        isConnected: status?.isConnected ?? false,
        lastSuccessAt: status?.lastSuccessAt ?? null,
        lastFailureAt: status?.lastFailureAt ?? null,
        consecutiveFailures: status?.consecutiveFailures ?? 0,
        errorMessage: status?.errorMessage ?? null,
      };
    });
    res.json({
      cameras: result,
      connected: result.filter((c) => c.isConnected).length,
      total: result.length,
    });
  });

  router.get('/:cameraId/snapshot', (req, res) => {
    const { cameraId } = req.params;
    if (!cameras.some((c) => c.id === cameraId)) {
      res.status(404).json({ error: `Camera '${cameraId}' not found` });
      return;
    }

    const imagePath = activities.latestImagePath(cameraId);
    if (!imagePath) {
      res.status(404).json({ error: `No snapshot available for '${cameraId}'` });
      return;
    }

    res.set('Cache-Control', 'no-cache, no-store, must-revalidate');
    res.sendFile(resolve(imagePath), (err) => {
      if (err && !res.headersSent) {
        console.error(`[Camera API] Failed to send snapshot for ${cameraId}:`, err.message);
        res.status(404).json({ error: `Snapshot file missing for '${cameraId}'` });
      }
    });
  });

  return router;
}
