/**
 * packages/core/src/animation/types.ts — Core animation API types.
 *
 * Why: Keyframe curves are shared by the plan builders and the timelines that
 * play them, so both sides agree on one shape.
 */

/** One point on a curve: `value` reached at normalized time `fraction` in [0..1]. */
export type Keyframe = Readonly<{
  fraction: number;
  value: number;
}>;

/** Ordered keyframes, evaluated with linear interpolation between neighbours. */
export type KeyframeCurve = readonly Keyframe[];

/**
 * Playable animation capability. Implementations own elapsed time and the
 * current value; callers drive them with `advance`.
 */
export interface Timeline {
  /** Replace the curve and start playing from its first keyframe. */
  start(curve: KeyframeCurve, durationMs: number): void;
  /** Stop in place. Does not fire `onComplete`. */
  cancel(): void;
  /** Jump to the final value and stop, firing `onComplete` if it was running. */
  end(): void;
  /** Move forward by `elapsedMs` and return the new value. */
  advance(elapsedMs: number): number;
  value(): number;
  isRunning(): boolean;
  /** Called once when a started run reaches its end. */
  onComplete: (() => void) | undefined;
}
