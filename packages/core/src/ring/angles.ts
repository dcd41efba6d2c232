/**
 * packages/core/src/ring/angles.ts — Ring angle invariants.
 *
 * Angles are in revolutions (1.0 = 360°) and are allowed to grow past 1 while
 * a plan runs; `reduceAngles` folds them back before the next plan is built.
 */

import { ANGULAR_EPSILON } from "./constants.js";

export type RingAngles = Readonly<{
  ringStart: number;
  ringEnd: number;
}>;

export const ZERO_ANGLES: RingAngles = Object.freeze({ ringStart: 0, ringEnd: 0 });

export function createAngles(ringStart: number, ringEnd: number): RingAngles {
  return Object.freeze({ ringStart, ringEnd });
}

/**
 * Clamp the span into [0, 1] and re-base so `ringStart` lies in [0, 1).
 * Idempotent; the span is preserved whenever it was already valid.
 */
export function reduceAngles(angles: RingAngles): RingAngles {
  let { ringStart, ringEnd } = angles;
  if (!Number.isFinite(ringStart)) return ZERO_ANGLES;
  if (!Number.isFinite(ringEnd)) ringEnd = ringStart;

  if (ringEnd < ringStart) ringEnd = ringStart;
  if (ringEnd > ringStart + 1) ringEnd = ringStart + 1;

  if (ringStart >= 1 || ringStart < 0) {
    const turns = Math.floor(ringStart);
    ringStart -= turns;
    ringEnd -= turns;
  }

  if (ringStart === angles.ringStart && ringEnd === angles.ringEnd) return angles;
  return createAngles(ringStart, ringEnd);
}

/** True when the trailing edge sits at the top of the circle. */
export function isCleanBoundary(ringStart: number): boolean {
  return ringStart < ANGULAR_EPSILON;
}

export function arcSpan(angles: RingAngles): number {
  return angles.ringEnd - angles.ringStart;
}
