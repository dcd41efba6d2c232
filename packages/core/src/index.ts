/**
 * @arcflow/core
 *
 * Runtime-agnostic circular progress ring animation: the ring state machine,
 * the keyframe timelines it plays, and the host-side controller around it.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { RingError, type RingErrorCode } from "./errors.js";

// =============================================================================
// Animation primitives
// =============================================================================

export { clamp01, interpolateNumber, normalizeDurationMs } from "./animation/interpolate.js";
export {
  type NormalizedCurve,
  createKeyframeTimeline,
  normalizeCurve,
  sampleCurve,
} from "./animation/timeline.js";
export type { Keyframe, KeyframeCurve, Timeline } from "./animation/types.js";

// =============================================================================
// Ring core
// =============================================================================

export {
  ANGULAR_EPSILON,
  DEFAULT_RING_DURATION_MS,
  SMALL_ARC_THRESHOLD,
  SMALL_ARC_THRESHOLD_WIDE,
} from "./ring/constants.js";
export {
  type RingAngles,
  ZERO_ANGLES,
  arcSpan,
  createAngles,
  isCleanBoundary,
  reduceAngles,
} from "./ring/angles.js";
export {
  type RingPlan,
  type RingPlanKind,
  buildDeterminatePlan,
  buildIndeterminatePlan,
} from "./ring/plan.js";
export {
  type NormalizedRingAnimatorConfig,
  type RingAnimatorConfig,
  normalizeRingAnimatorConfig,
} from "./ring/config.js";
export { RingAnimator, type RingMode } from "./ring/ringAnimator.js";

// =============================================================================
// Host surface
// =============================================================================

export { type RingArc, type RingArcOptions, ringArc } from "./ring/arc.js";
export {
  type RingSavedState,
  parseRingState,
  readRingState,
  serializeRingState,
} from "./ring/savedState.js";
export { RingUpdateQueue, type RingUpdateQueueOptions } from "./ring/updateQueue.js";
export {
  type FrameScheduler,
  type RingTicker,
  type RingTickerOptions,
  createRingTicker,
} from "./ring/ticker.js";
export {
  type LayoutDirection,
  ProgressRing,
  type ProgressRingConfig,
  type SetProgressOptions,
} from "./ring/progressRing.js";
