/**
 * packages/core/src/animation/timeline.ts — Linear keyframe timelines.
 */

import { RingError } from "../errors.js";
import { clamp01, interpolateNumber, normalizeDurationMs } from "./interpolate.js";
import type { Keyframe, KeyframeCurve, Timeline } from "./types.js";

export type NormalizedCurve = Readonly<{
  keyframes: readonly Keyframe[];
  initialValue: number;
  finalValue: number;
}>;

function invalidPlan(detail: string): never {
  throw new RingError("RING_INVALID_PLAN", detail);
}

/**
 * Validate and freeze a keyframe curve.
 *
 * Fractions must be finite, inside [0, 1] and non-decreasing; values must be finite.
 */
export function normalizeCurve(keyframes: KeyframeCurve): NormalizedCurve {
  if (keyframes.length === 0) invalidPlan("keyframe curve must not be empty");

  const frozen: Keyframe[] = [];
  let previousFraction = 0;
  for (let i = 0; i < keyframes.length; i++) {
    const frame = keyframes[i];
    if (frame === undefined) continue;
    if (!Number.isFinite(frame.fraction) || frame.fraction < 0 || frame.fraction > 1) {
      invalidPlan(`keyframe ${String(i)} fraction must be within [0, 1]`);
    }
    if (frame.fraction < previousFraction) {
      invalidPlan(`keyframe ${String(i)} fraction is out of order`);
    }
    if (!Number.isFinite(frame.value)) {
      invalidPlan(`keyframe ${String(i)} value must be finite`);
    }
    previousFraction = frame.fraction;
    frozen.push(Object.freeze({ fraction: frame.fraction, value: frame.value }));
  }

  return Object.freeze({
    keyframes: Object.freeze(frozen),
    initialValue: frozen[0]?.value ?? 0,
    finalValue: frozen[frozen.length - 1]?.value ?? 0,
  });
}

/** Evaluate a curve at normalized time `fraction` with no easing. */
export function sampleCurve(curve: NormalizedCurve, fraction: number): number {
  const t = clamp01(fraction);
  const frames = curve.keyframes;
  const first = frames[0];
  if (first === undefined || t <= first.fraction) return curve.initialValue;

  for (let i = 1; i < frames.length; i++) {
    const prev = frames[i - 1];
    const next = frames[i];
    if (prev === undefined || next === undefined) continue;
    if (t <= next.fraction) {
      const width = next.fraction - prev.fraction;
      if (width <= 0) return next.value;
      return interpolateNumber(prev.value, next.value, (t - prev.fraction) / width);
    }
  }

  return curve.finalValue;
}

class KeyframeTimelineImpl implements Timeline {
  onComplete: (() => void) | undefined = undefined;

  private curve: NormalizedCurve | null = null;
  private durationMs = 0;
  private elapsedMs = 0;
  private current: number;
  private running = false;

  constructor(initialValue: number) {
    this.current = initialValue;
  }

  start(curve: KeyframeCurve, durationMs: number): void {
    this.curve = normalizeCurve(curve);
    this.durationMs = normalizeDurationMs(durationMs, 0);
    this.elapsedMs = 0;
    this.current = this.curve.initialValue;
    this.running = true;
  }

  cancel(): void {
    this.running = false;
  }

  end(): void {
    if (this.curve === null) return;
    this.elapsedMs = this.durationMs;
    this.current = this.curve.finalValue;
    this.finish();
  }

  advance(elapsedMs: number): number {
    const curve = this.curve;
    if (!this.running || curve === null) return this.current;

    if (Number.isFinite(elapsedMs) && elapsedMs > 0) {
      this.elapsedMs += elapsedMs;
    }
    const fraction = this.durationMs <= 0 ? 1 : this.elapsedMs / this.durationMs;
    if (fraction >= 1) {
      this.current = curve.finalValue;
      this.finish();
      return this.current;
    }
    this.current = sampleCurve(curve, fraction);
    return this.current;
  }

  value(): number {
    return this.current;
  }

  isRunning(): boolean {
    return this.running;
  }

  private finish(): void {
    if (!this.running) return;
    this.running = false;
    this.onComplete?.();
  }
}

/** Create an idle timeline holding `initialValue` until its first `start`. */
export function createKeyframeTimeline(initialValue = 0): Timeline {
  return new KeyframeTimelineImpl(initialValue);
}
