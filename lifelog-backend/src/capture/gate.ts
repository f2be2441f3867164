/**
 * Capture gate: decides whether a frame is worth a paid vision analysis.
 *
 * Decision order (first match wins):
 *  1. No person at or above the confidence minimum
 *       forced interval elapsed  → ANALYZE  forced_interval_no_person
 *       otherwise                → SKIP     no_person_detected
 *  2. No stored state for the camera  → ANALYZE  initial_capture
 *  3. Forced interval elapsed         → ANALYZE  forced_interval_elapsed
 *  4. Top-left corner moved > threshold (Euclidean px)  → ANALYZE  movement_detected
 *  5. Frame difference > threshold    → ANALYZE  visual_change_detected
 *  6. Otherwise                       → SKIP     no_significant_changes
 *
 * The interval counts as elapsed when there is no stored state, so a camera's
 * very first capture is never skipped. Movement and difference compare with
 * `>`, the interval with `>=`.
 *
 * Business outcomes are always returned as decisions. Only infrastructure
 * failures (an undecodable frame) reject.
 */

import type { GateReason } from '../db/schema.js';
import { dominantDetection, type BoundingBox, type Detection } from '../vision/detector.js';
import { frameDifference, type FrameDifferenceFn } from '../vision/frame-difference.js';
import type { ObservationState, ObservationStateStore } from './observation-store.js';

export interface GateThresholds {
  /** Detections below this confidence count as no detection */
  minConfidence: number;
  movementPx: number;
  /** On the frame-difference [0, 1] scale */
  frameDifference: number;
  forceIntervalMs: number;
}

export interface GateInput {
  cameraId: string;
  frame: Buffer;
  detections: Detection[];
  now: Date;
}

export interface GateMetrics {
  /** null when the camera has no stored state */
  elapsedMs: number | null;
  movementPx: number | null;
  frameDifference: number | null;
}

export interface GateDecision {
  action: 'analyze' | 'skip';
  reason: GateReason;
  detection: Detection | null;
  metrics: GateMetrics;
  /** Replacement state when action is 'analyze' */
  nextState: ObservationState | null;
}

export const GATE_REASON_LABELS: Record<GateReason, string> = {
  no_person_detected: 'no person detected',
  forced_interval_no_person: 'forced interval, no person',
  initial_capture: 'initial capture',
  forced_interval_elapsed: 'forced interval elapsed',
  movement_detected: 'movement detected',
  visual_change_detected: 'visual change detected',
  no_significant_changes: 'no significant changes',
};

/** Distance between the top-left corners of two boxes. */
export function bboxMovement(current: BoundingBox, previous: BoundingBox | null): number {
  if (!previous) return Number.POSITIVE_INFINITY;
  return Math.hypot(current.x - previous.x, current.y - previous.y);
}

export async function evaluateGate(
  input: GateInput,
  previous: ObservationState | null,
  thresholds: GateThresholds,
  diff: FrameDifferenceFn = frameDifference,
): Promise<GateDecision> {
  const detection = dominantDetection(input.detections, thresholds.minConfidence);
  const metrics: GateMetrics = {
    elapsedMs: previous ? input.now.getTime() - previous.lastAnalyzedAt.getTime() : null,
    movementPx: null,
    frameDifference: null,
  };
  const intervalElapsed = metrics.elapsedMs === null || metrics.elapsedMs >= thresholds.forceIntervalMs;

  const analyze = (reason: GateReason): GateDecision => ({
    action: 'analyze',
    reason,
    detection,
    metrics,
    nextState: {
      cameraId: input.cameraId,
      lastAnalyzedAt: input.now,
      lastBbox: detection?.bbox ?? null,
      lastFrame: input.frame,
    },
  });
  const skip = (reason: GateReason): GateDecision => ({
    action: 'skip',
    reason,
    detection,
    metrics,
    nextState: null,
  });

  // 1. Nobody there
  if (!detection) {
    return intervalElapsed ? analyze('forced_interval_no_person') : skip('no_person_detected');
  }

  // 2. First capture
  if (!previous) {
    return analyze('initial_capture');
  }

  // 3. Bounded staleness
  if (intervalElapsed) {
    return analyze('forced_interval_elapsed');
  }

  // 4. Movement
  metrics.movementPx = bboxMovement(detection.bbox, previous.lastBbox);
  if (metrics.movementPx > thresholds.movementPx) {
    return analyze('movement_detected');
  }

  // 5. Visual change
  metrics.frameDifference = await diff(input.frame, previous.lastFrame);
  if (metrics.frameDifference > thresholds.frameDifference) {
    return analyze('visual_change_detected');
  }

  return skip('no_significant_changes');
}

/**
 * Stateful wrapper: loads the camera's state, evaluates, and replaces the
 * state on every analyze decision.
 */
export class CaptureGate {
  constructor(
    private readonly store: ObservationStateStore,
    private readonly thresholds: GateThresholds,
    private readonly diff: FrameDifferenceFn = frameDifference,
  ) {}

  async decide(cameraId: string, frame: Buffer, detections: Detection[], now: Date = new Date()): Promise<GateDecision> {
    const previous = this.store.get(cameraId);
    const decision = await evaluateGate({ cameraId, frame, detections, now }, previous, this.thresholds, this.diff);
    if (decision.nextState) {
      this.store.put(decision.nextState);
    }
    return decision;
  }
}
