import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

const activeHoursSchema = z.object({
  start: z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:MM'),
  end: z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:MM'),
});

const cameraSchema = z.object({
  id: z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, 'letters, digits, "_" and "-" only'),
  name: z.string().min(1).optional(),
  room: z.string().min(1),
  snapshotUrl: z.string().url(),
  intervalMinutes: z.number().positive().default(15),
  activeHours: activeHoursSchema.optional(),
  enabled: z.boolean().default(true),
});

const camerasSchema = z.array(cameraSchema).superRefine((cameras, ctx) => {
  const seen = new Set<string>();
  cameras.forEach((camera, index) => {
    if (seen.has(camera.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `duplicate camera id "${camera.id}"`,
      });
    }
    seen.add(camera.id);
  });
});

export type CameraConfig = z.infer<typeof cameraSchema>;
export type ActiveHours = z.infer<typeof activeHoursSchema>;

/**
 * Camera list from CAMERAS (inline JSON) or CAMERAS_FILE (path to a JSON file).
 * Format: [{"id":"kitchen","room":"Kitchen","snapshotUrl":"http://cam/snap.jpg","intervalMinutes":5}]
 */
function loadCameras(): CameraConfig[] {
  let raw = process.env.CAMERAS || '[]';
  if (process.env.CAMERAS_FILE) {
    raw = readFileSync(process.env.CAMERAS_FILE, 'utf-8');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Camera configuration is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCameras(json);
}

/** Validates a camera list; ids must be unique. */
export function parseCameras(json: unknown): CameraConfig[] {
  const parsed = camerasSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid camera configuration: ${issues}`);
  }
  return parsed.data;
}

export const config = {
  port: parseInt(process.env.PORT || '4000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Auth
  jwtSecret: process.env.JWT_SECRET || (() => {
    if (process.env.NODE_ENV === 'production') {
      throw new Error('JWT_SECRET must be set in production');
    }
    return 'lifelog-dev-secret';
  })(),
  operatorPassword: process.env.LIFELOG_PASSWORD || 'lifelog',
  operatorName: process.env.OPERATOR_NAME || 'operator',

  // Storage
  dbPath: process.env.DB_PATH || './data/lifelog.db',
  framesDir: process.env.FRAMES_DIR || './data/frames',

  // Calendar days (streaks, daily spend) are counted in this zone
  timezone: process.env.TIMEZONE || 'UTC',

  // Cameras
  cameras: loadCameras(),
  snapshotTimeoutMs: parseInt(process.env.SNAPSHOT_TIMEOUT_MS || '10000', 10),

  // Person detector sidecar (POST image/jpeg -> detections JSON)
  detectorUrl: process.env.DETECTOR_URL || 'http://localhost:8500/detect',
  detectorTimeoutMs: parseInt(process.env.DETECTOR_TIMEOUT_MS || '10000', 10),

  // Vision analysis (OpenAI-compatible endpoint)
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  openaiApiBase: process.env.OPENAI_API_BASE || 'https://api.openai.com/v1',
  visionModel: process.env.VISION_MODEL || 'gpt-4o-mini',
  visionMaxTokens: parseInt(process.env.VISION_MAX_TOKENS || '300', 10),
  analysisTimeoutMs: parseInt(process.env.ANALYSIS_TIMEOUT_MS || '30000', 10),

  // Capture gate
  personConfidenceThreshold: parseFloat(process.env.PERSON_CONFIDENCE_THRESHOLD || '0.5'),
  movementThresholdPx: parseFloat(process.env.MOVEMENT_THRESHOLD_PX || '50'),
  frameDifferenceThreshold: parseFloat(process.env.FRAME_DIFFERENCE_THRESHOLD || '0.15'),
  forceAnalyzeIntervalMinutes: parseFloat(process.env.FORCE_ANALYZE_INTERVAL_MIN || '30'),

  // Timeline
  durationCeilingMinutes: parseInt(process.env.DURATION_CEILING_MIN || '240', 10),
  timelineIntervalMinutes: parseInt(process.env.TIMELINE_INTERVAL_MIN || '15', 10),

  // Cost governor defaults (seed values for the cost_settings row)
  defaultDailyCap: parseFloat(process.env.DEFAULT_DAILY_CAP || '2.00'),
  defaultNotificationThreshold: parseFloat(process.env.DEFAULT_NOTIFICATION_THRESHOLD || '1.50'),

  // CORS
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:5173,http://localhost:3000')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean),
} as const;
