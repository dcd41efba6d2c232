/**
 * packages/core/src/ring/plan.ts — Animation plans for mode and progress changes.
 *
 * Why: Every transition starts from the current angles, so the first keyframe
 * of both curves always equals the value on screen. Continuity comes from where
 * the keyframes sit, not from easing; plans are played linearly.
 */

import type { Keyframe, KeyframeCurve } from "../animation/types.js";
import { type RingAngles, arcSpan, isCleanBoundary, reduceAngles } from "./angles.js";
import {
  MAX_WRAP_FRACTION,
  SWEEP_END_KEYFRAMES,
  SWEEP_START_KEYFRAMES,
  WRAP_SLIVER,
} from "./constants.js";

export type RingPlanKind =
  | "determinate-catch-up"
  | "determinate-wrap"
  | "indeterminate-sweep"
  | "indeterminate-wrap";

export type RingPlan = Readonly<{
  kind: RingPlanKind;
  startKeyframes: KeyframeCurve;
  endKeyframes: KeyframeCurve;
  durationMs: number;
}>;

function keyframe(fraction: number, value: number): Keyframe {
  return Object.freeze({ fraction, value });
}

function curve(...frames: Keyframe[]): KeyframeCurve {
  return Object.freeze(frames);
}

function scaledDuration(baseDurationMs: number, revolutions: number): number {
  return Math.max(0, Math.trunc(baseDurationMs * revolutions));
}

function createPlan(
  kind: RingPlanKind,
  startKeyframes: KeyframeCurve,
  endKeyframes: KeyframeCurve,
  durationMs: number,
): RingPlan {
  return Object.freeze({ kind, startKeyframes, endKeyframes, durationMs });
}

/**
 * Plan the move to determinate `progress`.
 *
 * From a clean boundary with an arc no longer than the target the arc simply
 * fills. Otherwise both edges run to the next whole revolution, meet there,
 * and the head continues on to `next + progress`.
 */
export function buildDeterminatePlan(
  angles: RingAngles,
  progress: number,
  baseDurationMs: number,
): RingPlan {
  const { ringStart, ringEnd } = reduceAngles(angles);

  if (isCleanBoundary(ringStart) && ringEnd <= progress) {
    return createPlan(
      "determinate-catch-up",
      curve(keyframe(0, ringStart), keyframe(1, 0)),
      curve(keyframe(0, ringEnd), keyframe(1, progress)),
      scaledDuration(baseDurationMs, progress - ringEnd),
    );
  }

  const next = Math.ceil(ringEnd);
  const timeToReset = next - ringStart;
  const total = timeToReset + progress;
  const wrapFraction = total > 0 ? Math.min(MAX_WRAP_FRACTION, timeToReset / total) : MAX_WRAP_FRACTION;

  return createPlan(
    "determinate-wrap",
    curve(keyframe(0, ringStart), keyframe(wrapFraction, next), keyframe(1, next)),
    curve(keyframe(0, ringEnd), keyframe(wrapFraction, next), keyframe(1, next + progress)),
    scaledDuration(baseDurationMs, total),
  );
}

/**
 * Plan one indeterminate cycle.
 *
 * A short arc runs the grow-then-chase sweep from where it is. A wide arc
 * first closes onto the next whole revolution, leaving a sliver visible; the
 * sweep proper starts on the following cycle.
 */
export function buildIndeterminatePlan(
  angles: RingAngles,
  baseDurationMs: number,
  smallArcThreshold: number,
): RingPlan {
  const reduced = reduceAngles(angles);
  const { ringStart, ringEnd } = reduced;

  if (arcSpan(reduced) <= smallArcThreshold) {
    const base = isCleanBoundary(ringStart) ? 0 : ringStart;
    const start = [keyframe(0, ringStart)];
    for (const [fraction, offset] of SWEEP_START_KEYFRAMES) {
      start.push(keyframe(fraction, base + offset));
    }
    const end = [keyframe(0, ringEnd)];
    for (const [fraction, offset] of SWEEP_END_KEYFRAMES) {
      end.push(keyframe(fraction, base + offset));
    }
    return createPlan(
      "indeterminate-sweep",
      curve(...start),
      curve(...end),
      scaledDuration(baseDurationMs, 1),
    );
  }

  const next = Math.ceil(ringEnd);
  return createPlan(
    "indeterminate-wrap",
    curve(keyframe(0, ringStart), keyframe(1, next)),
    curve(keyframe(0, ringEnd), keyframe(1, next + WRAP_SLIVER)),
    scaledDuration(baseDurationMs, next - ringStart),
  );
}
