/**
 * packages/core/src/ring/config.ts — Ring animator configuration.
 */

import { clamp01 } from "../animation/interpolate.js";
import { createKeyframeTimeline } from "../animation/timeline.js";
import type { Timeline } from "../animation/types.js";
import { RingError } from "../errors.js";
import { DEFAULT_RING_DURATION_MS, SMALL_ARC_THRESHOLD } from "./constants.js";
import { defaultWarn } from "./devWarnings.js";

export type RingAnimatorConfig = Readonly<{
  /** Cadence of one indeterminate sweep in milliseconds. Other durations scale from it. */
  durationMs?: number;
  /** Widest arc span, in revolutions, that restarts the sweep in place instead of wrapping first. */
  smallArcThreshold?: number;
  /** Start in indeterminate mode. */
  indeterminate?: boolean;
  /** Initial determinate fraction in [0, 1]. */
  progress?: number;
  /** Accept ticks right away instead of waiting for `start()`. */
  autoStart?: boolean;
  /** Called whenever the angles may have changed and the arc should be redrawn. */
  onInvalidate?: () => void;
  /** Enables development warnings. */
  devMode?: boolean;
  /** Sink for development warnings. Defaults to `console.warn`. */
  warn?: (message: string) => void;
  /** Timeline factory, one call per ring edge. */
  createTimeline?: (initialValue: number) => Timeline;
}>;

export type NormalizedRingAnimatorConfig = Readonly<{
  durationMs: number;
  smallArcThreshold: number;
  indeterminate: boolean;
  progress: number;
  autoStart: boolean;
  onInvalidate: (() => void) | undefined;
  devMode: boolean;
  warn: (message: string) => void;
  createTimeline: (initialValue: number) => Timeline;
}>;

function invalidConfig(detail: string): never {
  throw new RingError("RING_INVALID_CONFIG", detail);
}

/** Validate a base duration: a positive integer number of milliseconds. */
export function requireDurationMs(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidConfig(`${name} must be a positive integer`);
  return v;
}

function requireThreshold(v: number): number {
  if (!Number.isFinite(v) || v < 0 || v > 1) {
    invalidConfig("smallArcThreshold must be within [0, 1]");
  }
  return v;
}

export function normalizeRingAnimatorConfig(
  config: RingAnimatorConfig | undefined,
): NormalizedRingAnimatorConfig {
  const cfg = config ?? {};
  return Object.freeze({
    durationMs:
      cfg.durationMs === undefined
        ? DEFAULT_RING_DURATION_MS
        : requireDurationMs("durationMs", cfg.durationMs),
    smallArcThreshold:
      cfg.smallArcThreshold === undefined
        ? SMALL_ARC_THRESHOLD
        : requireThreshold(cfg.smallArcThreshold),
    indeterminate: cfg.indeterminate ?? true,
    progress: clamp01(cfg.progress ?? 0),
    autoStart: cfg.autoStart ?? true,
    onInvalidate: cfg.onInvalidate,
    devMode: cfg.devMode === true,
    warn: cfg.warn ?? defaultWarn,
    createTimeline: cfg.createTimeline ?? createKeyframeTimeline,
  });
}
