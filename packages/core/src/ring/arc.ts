/**
 * packages/core/src/ring/arc.ts — Ring angles to drawable arc geometry.
 */

import { type RingAngles, arcSpan } from "./angles.js";

/** Arc in degrees, measured clockwise from 3 o'clock as canvas APIs expect. */
export type RingArc = Readonly<{
  startAngle: number;
  sweepAngle: number;
}>;

export type RingArcOptions = Readonly<{
  /** Reflect across the vertical axis for right-to-left layouts. */
  mirror?: boolean;
}>;

/** Revolution 0 points at 12 o'clock. */
const TOP_OFFSET_DEGREES = -90;

export function ringArc(angles: RingAngles, opts: RingArcOptions = {}): RingArc {
  const startAngle = 360 * angles.ringStart + TOP_OFFSET_DEGREES;
  const sweepAngle = 360 * arcSpan(angles);
  if (opts.mirror !== true) {
    return Object.freeze({ startAngle, sweepAngle });
  }
  return Object.freeze({ startAngle: 180 - startAngle - sweepAngle, sweepAngle });
}
