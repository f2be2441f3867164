import type { Database as DatabaseType } from 'better-sqlite3';

export interface MigrationDefaults {
  dailyCap: number;
  notificationThreshold: number;
}

/**
 * Create tables with CREATE TABLE IF NOT EXISTS and add columns that older
 * databases are missing. Safe to run on every boot.
 */
export function runMigrations(sqlite: DatabaseType, defaults: MigrationDefaults): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS capture_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      camera_id TEXT NOT NULL,
      room TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      captured_on TEXT NOT NULL,
      activity TEXT,
      details TEXT,
      category TEXT,
      category_confidence REAL,
      person_label TEXT,
      person_detected INTEGER NOT NULL DEFAULT 0,
      detection_confidence REAL NOT NULL DEFAULT 0,
      analysis_skipped INTEGER NOT NULL DEFAULT 0,
      skip_reason TEXT,
      gate_reason TEXT,
      input_tokens INTEGER,
      output_tokens INTEGER,
      tokens_used INTEGER,
      cost REAL,
      duration_minutes INTEGER,
      image_path TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_capture_events_timestamp ON capture_events(timestamp);
    CREATE INDEX IF NOT EXISTS idx_capture_events_captured_on ON capture_events(captured_on);
    CREATE INDEX IF NOT EXISTS idx_capture_events_camera ON capture_events(camera_id);
    CREATE INDEX IF NOT EXISTS idx_capture_events_room ON capture_events(room);
    CREATE INDEX IF NOT EXISTS idx_capture_events_category ON capture_events(category);
    CREATE INDEX IF NOT EXISTS idx_capture_events_person ON capture_events(person_label);

    CREATE TABLE IF NOT EXISTS camera_observations (
      camera_id TEXT PRIMARY KEY,
      last_analyzed_at TEXT NOT NULL,
      bbox_x REAL,
      bbox_y REAL,
      bbox_width REAL,
      bbox_height REAL,
      last_frame BLOB NOT NULL
    );

    CREATE TABLE IF NOT EXISTS cost_settings (
      id INTEGER PRIMARY KEY,
      daily_cap REAL NOT NULL DEFAULT 2.00,
      notification_threshold REAL NOT NULL DEFAULT 1.50,
      warning_sent_on TEXT,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS user_streaks (
      user_id TEXT PRIMARY KEY,
      current_streak INTEGER NOT NULL DEFAULT 0,
      longest_streak INTEGER NOT NULL DEFAULT 0,
      last_activity_date TEXT,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS camera_status (
      camera_id TEXT PRIMARY KEY,
      is_connected INTEGER NOT NULL DEFAULT 0,
      last_success_at TEXT,
      last_failure_at TEXT,
      consecutive_failures INTEGER NOT NULL DEFAULT 0,
      error_message TEXT,
      updated_at TEXT NOT NULL
    );
  `);

  // Gate reason column: add if missing on databases created before it existed
  const columns = sqlite.prepare(`PRAGMA table_info(capture_events)`).all() as Array<{ name: string }>;
  if (!columns.some((c) => c.name === 'gate_reason')) {
    sqlite.exec(`ALTER TABLE capture_events ADD COLUMN gate_reason TEXT;`);
  }

  // Seed the cost settings singleton; an existing row keeps its values
  sqlite
    .prepare(`INSERT OR IGNORE INTO cost_settings (id, daily_cap, notification_threshold) VALUES (1, ?, ?)`)
    .run(defaults.dailyCap, defaults.notificationThreshold);
}
