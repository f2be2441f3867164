/**
 * One capture attempt: detect → gate → budget → analyze → persist.
 *
 * Every attempt that reaches the pipeline writes exactly one capture event,
 * analyzed or skipped, so gate behaviour and savings stay auditable:
 *
 *   detector fails        → skipped, detection_error (gate state untouched)
 *   frame undecodable     → skipped, gate_error
 *   gate says skip        → skipped, <gate reason>
 *   budget blocked        → skipped, cost_cap_reached (gate state kept)
 *   analyzer fails        → skipped, analysis_error (cost/tokens null)
 *   frame not archived    → analyzed as usual, imagePath null
 *   otherwise             → analyzed row with the analyzer's fields
 *
 * Storage errors are not caught here; they reach the scheduler.
 */

import type { CameraConfig } from '../config.js';
import type { ActivityStore } from '../db/activity-store.js';
import {
  SKIPPED_ACTIVITY,
  type CaptureEventRow,
  type GateReason,
  type NewCaptureEvent,
  type SkipReason,
} from '../db/schema.js';
import type { BudgetStatus, CostGovernor } from '../cost/governor.js';
import type { Analyzer } from '../vision/analyzer.js';
import type { Detection, Detector } from '../vision/detector.js';
import { toCalendarDate } from '../utils/dates.js';
import { errorMessage } from '../utils/errors.js';
import type { FrameArchive } from './frame-archive.js';
import { GATE_REASON_LABELS, type CaptureGate, type GateDecision } from './gate.js';

/** Label given to a detected person until someone tags the event. */
export const UNKNOWN_PERSON = 'Unknown';

export interface CapturePipelineDeps {
  detector: Detector;
  gate: Pick<CaptureGate, 'decide'>;
  governor: Pick<CostGovernor, 'check' | 'claimThresholdWarning'>;
  analyzer: Analyzer;
  activities: Pick<ActivityStore, 'insert'>;
  frames: FrameArchive;
  timeZone: string;
  /** Called with every persisted event */
  onCapture?: (event: CaptureEventRow) => void;
  /** Called once per day when spend reaches the notification threshold */
  onBudgetAlert?: (status: BudgetStatus) => void;
}

export interface CaptureOutcome {
  event: CaptureEventRow;
  decision: GateDecision | null;
  budget: BudgetStatus | null;
}

type CameraRef = Pick<CameraConfig, 'id' | 'room'>;

export class CapturePipeline {
  constructor(private readonly deps: CapturePipelineDeps) {}

  async process(camera: CameraRef, frame: Buffer, now: Date = new Date()): Promise<CaptureOutcome> {
    const { deps } = this;

    // -- Detection ------------------------------------------------------------
    let detections: Detection[];
    try {
      detections = await deps.detector.detect(frame);
    } catch (err) {
      console.error(`[Capture] ${camera.id}: detection failed:`, errorMessage(err));
      const event = this.persist(this.skippedRow(camera, now, null, null, 'detection_error'));
      return { event, decision: null, budget: null };
    }

    // -- Gate -----------------------------------------------------------------
    let decision: GateDecision;
    try {
      decision = await deps.gate.decide(camera.id, frame, detections, now);
    } catch (err) {
      console.error(`[Gate] ${camera.id}: evaluation failed:`, errorMessage(err));
      const event = this.persist(this.skippedRow(camera, now, null, null, 'gate_error'));
      return { event, decision: null, budget: null };
    }

    if (decision.action === 'skip') {
      console.log(`[Capture] ${camera.id}: skipped (${GATE_REASON_LABELS[decision.reason]})`);
      const skipReason: SkipReason = decision.reason === 'no_person_detected' ? 'no_person_detected' : 'no_significant_changes';
      const event = this.persist(this.skippedRow(camera, now, decision.detection, decision.reason, skipReason));
      return { event, decision, budget: null };
    }

    // -- Budget ---------------------------------------------------------------
    const budget = deps.governor.check(now);
    if (budget.blocked) {
      console.warn(
        `[Cost] ${camera.id}: daily cap reached ($${budget.spent.toFixed(4)} / $${budget.dailyCap.toFixed(2)}), analysis skipped`,
      );
      const event = this.persist(this.skippedRow(camera, now, decision.detection, decision.reason, 'cost_cap_reached'));
      return { event, decision, budget };
    }

    // -- Analysis -------------------------------------------------------------
    let imagePath: string | null = null;
    try {
      imagePath = await deps.frames.save(camera.id, frame, now);
    } catch (err) {
      console.error(`[Capture] ${camera.id}: frame archive failed:`, errorMessage(err));
    }

    let event: CaptureEventRow;
    try {
      const result = await deps.analyzer.analyze(frame, { cameraId: camera.id, room: camera.room });
      event = this.persist({
        ...this.baseRow(camera, now, decision.detection, decision.reason),
        activity: result.activity,
        details: result.details,
        category: result.category,
        categoryConfidence: result.categoryConfidence,
        analysisSkipped: false,
        skipReason: null,
        inputTokens: result.inputTokens,
        outputTokens: result.outputTokens,
        tokensUsed: result.tokensUsed,
        cost: result.cost,
        imagePath,
      });
      console.log(
        `[Capture] ${camera.id}: analyzed (${GATE_REASON_LABELS[decision.reason]}) "${result.activity}" $${result.cost.toFixed(6)}`,
      );
    } catch (err) {
      console.error(`[Capture] ${camera.id}: analysis failed:`, errorMessage(err));
      event = this.persist({
        ...this.skippedRow(camera, now, decision.detection, decision.reason, 'analysis_error'),
        imagePath,
      });
      return { event, decision, budget };
    }

    this.checkThreshold(now);
    return { event, decision, budget };
  }

  // ---------------------------------------------------------------------------

  private baseRow(camera: CameraRef, now: Date, detection: Detection | null, gateReason: GateReason | null): NewCaptureEvent {
    return {
      cameraId: camera.id,
      room: camera.room,
      timestamp: now.toISOString(),
      capturedOn: toCalendarDate(now, this.deps.timeZone),
      personLabel: detection ? UNKNOWN_PERSON : null,
      personDetected: detection !== null,
      detectionConfidence: detection?.confidence ?? 0,
      gateReason,
    };
  }

  private skippedRow(
    camera: CameraRef,
    now: Date,
    detection: Detection | null,
    gateReason: GateReason | null,
    skipReason: SkipReason,
  ): NewCaptureEvent {
    // Failed analyses carry no spend figures at all
    const spend = skipReason === 'analysis_error' ? null : 0;
    return {
      ...this.baseRow(camera, now, detection, gateReason),
      activity: SKIPPED_ACTIVITY,
      analysisSkipped: true,
      skipReason,
      inputTokens: spend,
      outputTokens: spend,
      tokensUsed: spend,
      cost: spend,
    };
  }

  private persist(row: NewCaptureEvent): CaptureEventRow {
    const event = this.deps.activities.insert(row);
    this.deps.onCapture?.(event);
    return event;
  }

  private checkThreshold(now: Date): void {
    const status = this.deps.governor.check(now);
    if (!status.thresholdReached || !this.deps.governor.claimThresholdWarning(status.date)) {
      return;
    }
    console.warn(
      `[Cost] Notification threshold reached: $${status.spent.toFixed(4)} of $${status.dailyCap.toFixed(2)} (${status.percentUsed.toFixed(1)}%)`,
    );
    this.deps.onBudgetAlert?.(status);
  }
}
