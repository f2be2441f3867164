import { sqliteTable, text, integer, real, blob } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

export const ACTIVITY_CATEGORIES = ['Productivity', 'Health', 'Entertainment', 'Social', 'Other'] as const;
export type ActivityCategory = (typeof ACTIVITY_CATEGORIES)[number];

export const SKIP_REASONS = [
  'no_person_detected',
  'no_significant_changes',
  'cost_cap_reached',
  'detection_error',
  'gate_error',
  'analysis_error',
] as const;
export type SkipReason = (typeof SKIP_REASONS)[number];

export const GATE_REASONS = [
  'no_person_detected',
  'forced_interval_no_person',
  'initial_capture',
  'forced_interval_elapsed',
  'movement_detected',
  'visual_change_detected',
  'no_significant_changes',
] as const;
export type GateReason = (typeof GATE_REASONS)[number];

/** Activity text written on every row that did not get a paid analysis. */
export const SKIPPED_ACTIVITY = 'Analysis skipped';

// ---------------------------------------------------------------------------
// Capture events -- one row per capture attempt, analyzed or skipped
// ---------------------------------------------------------------------------
export const captureEvents = sqliteTable('capture_events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  cameraId: text('camera_id').notNull(),
  room: text('room').notNull(),
  timestamp: text('timestamp').notNull(),        // ISO-8601 UTC
  capturedOn: text('captured_on').notNull(),     // YYYY-MM-DD in the configured time zone
  activity: text('activity'),
  details: text('details'),
  category: text('category', { enum: ACTIVITY_CATEGORIES }),
  categoryConfidence: real('category_confidence'),
  personLabel: text('person_label'),
  personDetected: integer('person_detected', { mode: 'boolean' }).notNull().default(false),
  detectionConfidence: real('detection_confidence').notNull().default(0),
  analysisSkipped: integer('analysis_skipped', { mode: 'boolean' }).notNull().default(false),
  skipReason: text('skip_reason', { enum: SKIP_REASONS }),
  gateReason: text('gate_reason', { enum: GATE_REASONS }),
  inputTokens: integer('input_tokens'),
  outputTokens: integer('output_tokens'),
  tokensUsed: integer('tokens_used'),
  cost: real('cost'),
  durationMinutes: integer('duration_minutes'),
  imagePath: text('image_path'),
});

// ---------------------------------------------------------------------------
// Camera observations -- the gate's memory of the last fully analyzed frame
// ---------------------------------------------------------------------------
export const cameraObservations = sqliteTable('camera_observations', {
  cameraId: text('camera_id').primaryKey(),
  lastAnalyzedAt: text('last_analyzed_at').notNull(),
  bboxX: real('bbox_x'),
  bboxY: real('bbox_y'),
  bboxWidth: real('bbox_width'),
  bboxHeight: real('bbox_height'),
  lastFrame: blob('last_frame', { mode: 'buffer' }).notNull(),
});

// ---------------------------------------------------------------------------
// Cost settings -- singleton row (id = 1)
// ---------------------------------------------------------------------------
export const costSettings = sqliteTable('cost_settings', {
  id: integer('id').primaryKey(),
  dailyCap: real('daily_cap').notNull().default(2.0),
  notificationThreshold: real('notification_threshold').notNull().default(1.5),
  warningSentOn: text('warning_sent_on'),
  updatedAt: text('updated_at').notNull().default(sql`(datetime('now'))`),
});

// ---------------------------------------------------------------------------
// User streaks -- derived, fully overwritten on each recompute
// ---------------------------------------------------------------------------
export const userStreaks = sqliteTable('user_streaks', {
  userId: text('user_id').primaryKey(),
  currentStreak: integer('current_streak').notNull().default(0),
  longestStreak: integer('longest_streak').notNull().default(0),
  lastActivityDate: text('last_activity_date'),
  updatedAt: text('updated_at').notNull().default(sql`(datetime('now'))`),
});

// ---------------------------------------------------------------------------
// Camera status -- snapshot connectivity per camera
// ---------------------------------------------------------------------------
export const cameraStatus = sqliteTable('camera_status', {
  cameraId: text('camera_id').primaryKey(),
  isConnected: integer('is_connected', { mode: 'boolean' }).notNull().default(false),
  lastSuccessAt: text('last_success_at'),
  lastFailureAt: text('last_failure_at'),
  consecutiveFailures: integer('consecutive_failures').notNull().default(0),
  errorMessage: text('error_message'),
  updatedAt: text('updated_at').notNull(),
});

export type CaptureEventRow = typeof captureEvents.$inferSelect;
export type NewCaptureEvent = typeof captureEvents.$inferInsert;
export type CostSettingsRow = typeof costSettings.$inferSelect;
export type UserStreakRow = typeof userStreaks.$inferSelect;
export type CameraStatusRow = typeof cameraStatus.$inferSelect;
