import type { CameraConfig } from './config.js';
import type { DatabaseHandle } from './db/connection.js';
import { createActivityStore, type ActivityStore } from './db/activity-store.js';
import { createCameraStatusStore, type CameraStatusStore } from './db/camera-status-store.js';
import { createCostSettingsStore } from './db/cost-settings-store.js';
import { createStreakStore, type StreakStore } from './db/streak-store.js';
import { CostGovernor } from './cost/governor.js';
import { TimelineMaintenance } from './timeline/maintenance.js';

export interface ServiceOptions {
  cameras: CameraConfig[];
  timeZone: string;
  operatorName: string;
  durationCeilingMinutes: number;
  timelineIntervalMinutes: number;
}

/** Everything the HTTP layer and background jobs share. */
export interface AppServices {
  database: DatabaseHandle;
  activities: ActivityStore;
  cameraStatus: CameraStatusStore;
  streaks: StreakStore;
  governor: CostGovernor;
  maintenance: TimelineMaintenance;
  cameras: CameraConfig[];
  timeZone: string;
  operatorName: string;
}

export function createServices(database: DatabaseHandle, options: ServiceOptions): AppServices {
  const activities = createActivityStore(database.db);
  const streaks = createStreakStore(database.db);

  return {
    database,
    activities,
    cameraStatus: createCameraStatusStore(database.db),
    streaks,
    governor: new CostGovernor(activities, createCostSettingsStore(database.db), options.timeZone),
    maintenance: new TimelineMaintenance({
      activities,
      streaks,
      userId: options.operatorName,
      timeZone: options.timeZone,
      ceilingMinutes: options.durationCeilingMinutes,
      intervalMinutes: options.timelineIntervalMinutes,
    }),
    cameras: options.cameras,
    timeZone: options.timeZone,
    operatorName: options.operatorName,
  };
}
