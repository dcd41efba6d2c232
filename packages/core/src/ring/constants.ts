/**
 * packages/core/src/ring/constants.ts — Ring animation constants.
 */

/** One tenth of a degree, in revolutions. Below this `ringStart` counts as a clean boundary. */
export const ANGULAR_EPSILON = 1 / 3600;

/** Base cadence of one indeterminate sweep; every other duration scales from it. */
export const DEFAULT_RING_DURATION_MS = 1333;

/** Widest arc that still restarts the sweep in place. */
export const SMALL_ARC_THRESHOLD = 0.5;
/** Looser threshold shipped by the older widget. */
export const SMALL_ARC_THRESHOLD_WIDE = 0.8;

/** Latest time fraction at which a wrap may land, so the fill leg never has zero length. */
export const MAX_WRAP_FRACTION = 0.99;

/** Arc kept visible while a wide indeterminate arc wraps to the next revolution. */
export const WRAP_SLIVER = 0.05;

// Indeterminate sweep keyframes, relative to the sweep base.
export const SWEEP_START_KEYFRAMES: readonly (readonly [fraction: number, offset: number])[] = [
  [0.5, 0.2],
  [0.7, 0.8],
  [1, 1.2],
];
export const SWEEP_END_KEYFRAMES: readonly (readonly [fraction: number, offset: number])[] = [
  [0.2, 0.65],
  [0.5, 1.05],
  [1, 1.25],
];
