import { Router } from 'express';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { config } from '../config.js';
import type { AppServices } from '../services.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  try {
    const pkgPath = join(__dirname, '..', '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    console.warn('[Health] Could not read package version:', err instanceof Error ? err.message : err);
  }
  return '1.0.0';
}

const version = readVersion();

export function createHealthRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    // Liveness check for Docker healthcheck compatibility
    if (req.query.liveness !== undefined) {
      res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime(), version });
      return;
    }

    try {
      const statuses = services.cameraStatus.list();

      const [dbResult, detectorResult] = await Promise.allSettled([
        // Database check
        (async () => {
          const start = Date.now();
          services.database.sqlite.prepare('SELECT 1').get();
          return { status: 'up' as const, responseMs: Date.now() - start };
        })(),
        // Detector sidecar: any HTTP answer means it is reachable
        (async () => {
          const start = Date.now();
          await fetch(config.detectorUrl, { method: 'HEAD', signal: AbortSignal.timeout(3000) });
          return { status: 'up' as const, responseMs: Date.now() - start };
        })(),
      ]);

      const components = {
        database: dbResult.status === 'fulfilled' ? dbResult.value : { status: 'down' as const, responseMs: 0 },
        detector: detectorResult.status === 'fulfilled' ? detectorResult.value : { status: 'down' as const, responseMs: 0 },
        analyzer: { status: config.openaiApiKey ? 'configured' : 'unconfigured', model: config.visionModel },
        cameras: {
          configured: services.cameras.length,
          connected: statuses.filter((s) => s.isConnected).length,
        },
      };

      const healthy = components.database.status === 'up' && components.detector.status === 'up';

      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        version,
        components,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
