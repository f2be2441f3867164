import express from 'express';
import { createServer } from 'node:http';
import cors from 'cors';
import { config } from './config.js';
import { db, sqlite } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { createRouter, errorHandler } from './api/routes.js';
import { setupSocketIO } from './realtime/socket.js';
import { createServices } from './services.js';
import { CaptureGate } from './capture/gate.js';
import { SqliteObservationStore } from './capture/observation-store.js';
import { CapturePipeline } from './capture/pipeline.js';
import { CaptureScheduler } from './capture/scheduler.js';
import { HttpSnapshotSource } from './capture/snapshot.js';
import { DiskFrameArchive } from './capture/frame-archive.js';
import { HttpDetector } from './vision/detector.js';
import { OpenAIVisionAnalyzer } from './vision/analyzer.js';

// Run database migrations before anything reads or writes
runMigrations(sqlite, {
  dailyCap: config.defaultDailyCap,
  notificationThreshold: config.defaultNotificationThreshold,
});

const services = createServices({ db, sqlite }, {
  cameras: config.cameras,
  timeZone: config.timezone,
  operatorName: config.operatorName,
  durationCeilingMinutes: config.durationCeilingMinutes,
  timelineIntervalMinutes: config.timelineIntervalMinutes,
});

// Create Express app and HTTP server
const app = express();
const server = createServer(app);

// CORS configuration
app.use(cors({
  origin: config.corsOrigins,
  credentials: true,
}));

// Body parsing
app.use(express.json());

// Mount routes
app.use(createRouter(services));
app.use(errorHandler);

// Set up Socket.IO on the HTTP server
const { io, eventsNs } = setupSocketIO(server);

// Capture pipeline
const gate = new CaptureGate(new SqliteObservationStore(db), {
  minConfidence: config.personConfidenceThreshold,
  movementPx: config.movementThresholdPx,
  frameDifference: config.frameDifferenceThreshold,
  forceIntervalMs: config.forceAnalyzeIntervalMinutes * 60_000,
});

if (!config.openaiApiKey) {
  console.warn('[Analyzer] OPENAI_API_KEY is not set; analysis requests will fail');
}

const pipeline = new CapturePipeline({
  detector: new HttpDetector(config.detectorUrl, config.detectorTimeoutMs),
  gate,
  governor: services.governor,
  analyzer: new OpenAIVisionAnalyzer({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiApiBase,
    model: config.visionModel,
    maxTokens: config.visionMaxTokens,
    timeoutMs: config.analysisTimeoutMs,
  }),
  activities: services.activities,
  frames: new DiskFrameArchive(config.framesDir, config.timezone),
  timeZone: config.timezone,
  onCapture: (event) => eventsNs.emit('capture', event),
  onBudgetAlert: (status) => eventsNs.emit('cost:alert', status),
});

const scheduler = new CaptureScheduler(config.cameras, {
  snapshots: new HttpSnapshotSource(config.snapshotTimeoutMs),
  pipeline,
  status: services.cameraStatus,
  timeZone: config.timezone,
});

// Durations and streaks
services.maintenance.start();

// Start listening -- IMPORTANT: listen on `server`, not `app` (Socket.IO requirement)
server.listen(config.port, () => {
  console.log(`Lifelog backend running on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Time zone: ${config.timezone}`);
  console.log(`  Health check: http://localhost:${config.port}/api/health`);

  scheduler.start();
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  console.log(`\n[${signal}] Shutting down gracefully...`);

  // Force exit after 10 seconds
  setTimeout(() => {
    console.error('Forced shutdown after timeout.');
    process.exit(1);
  }, 10000).unref();

  services.maintenance.stop();
  await scheduler.stop();
  io.close();
  server.close(() => {
    sqlite.close();
    console.log('Server closed.');
    process.exit(0);
  });
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    console.error('Shutdown failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
