/**
 * packages/core/src/ring/ringAnimator.ts — Ring animation state machine.
 *
 * Why: Owns the two ring edges and the current mode, and rebuilds the
 * animation plan on every mode or target change so the arc never jumps.
 * Indeterminate mode loops by re-arming a fresh cycle whenever the start edge
 * finishes; that step runs inside `tick`, after both edges have advanced, never
 * from within a timeline callback.
 *
 * Single-threaded: every entry point must be called from the frame loop's
 * context. Hosts that receive updates elsewhere queue them (see updateQueue.ts).
 */

import { clamp01 } from "../animation/interpolate.js";
import type { Timeline } from "../animation/types.js";
import { type RingAngles, createAngles, isCleanBoundary, reduceAngles } from "./angles.js";
import {
  type NormalizedRingAnimatorConfig,
  type RingAnimatorConfig,
  normalizeRingAnimatorConfig,
  requireDurationMs,
} from "./config.js";
import { type WarnRingIssueContext, warnRingIssue } from "./devWarnings.js";
import { type RingPlan, buildDeterminatePlan, buildIndeterminatePlan } from "./plan.js";

export type RingMode =
  | Readonly<{ kind: "indeterminate" }>
  | Readonly<{ kind: "determinate"; progress: number }>;

const INDETERMINATE: RingMode = Object.freeze({ kind: "indeterminate" });

function determinate(progress: number): RingMode {
  return Object.freeze({ kind: "determinate", progress });
}

export class RingAnimator {
  private readonly config: NormalizedRingAnimatorConfig;
  private readonly warnCtx: WarnRingIssueContext;
  private readonly startTimeline: Timeline;
  private readonly endTimeline: Timeline;

  private ringStart = 0;
  private ringEnd = 0;
  private mode: RingMode;
  private lastProgress: number;
  private durationMs: number;
  private started: boolean;
  private plan: RingPlan;
  private startEdgeCompleted = false;

  constructor(config?: RingAnimatorConfig) {
    this.config = normalizeRingAnimatorConfig(config);
    this.warnCtx = {
      devMode: this.config.devMode,
      warnedIssues: new Set<string>(),
      warn: this.config.warn,
    };
    this.durationMs = this.config.durationMs;
    this.lastProgress = this.config.progress;
    this.started = this.config.autoStart;

    this.startTimeline = this.config.createTimeline(0);
    this.endTimeline = this.config.createTimeline(0);
    this.startTimeline.onComplete = () => {
      this.startEdgeCompleted = true;
    };

    if (this.config.indeterminate) {
      this.mode = INDETERMINATE;
      this.plan = this.installPlan(
        buildIndeterminatePlan(this.getAngles(), this.durationMs, this.config.smallArcThreshold),
      );
    } else {
      this.mode = determinate(this.lastProgress);
      this.plan = this.installPlan(
        buildDeterminatePlan(this.getAngles(), this.lastProgress, this.durationMs),
      );
    }
  }

  getAngles(): RingAngles {
    return createAngles(this.ringStart, this.ringEnd);
  }

  getMode(): RingMode {
    return this.mode;
  }

  getPlan(): RingPlan {
    return this.plan;
  }

  isIndeterminate(): boolean {
    return this.mode.kind === "indeterminate";
  }

  /** Last explicitly set determinate fraction, kept while indeterminate. */
  getProgress(): number {
    return this.lastProgress;
  }

  getDuration(): number {
    return this.durationMs;
  }

  /** Change the base cadence. Takes effect on the next plan. */
  setDuration(durationMs: number): void {
    this.durationMs = requireDurationMs("durationMs", durationMs);
  }

  getSmallArcThreshold(): number {
    return this.config.smallArcThreshold;
  }

  /**
   * Switch modes. Leaving indeterminate mode resumes the last set progress.
   *
   * Entering indeterminate mode mid-sweep is deferred: the running determinate
   * plan finishes its revolution and `tick` switches over at the boundary.
   */
  setIndeterminate(indeterminate: boolean): void {
    if (!indeterminate) {
      if (this.mode.kind === "determinate") return;
      this.setProgress(this.lastProgress);
      return;
    }
    if (this.mode.kind === "indeterminate") return;

    this.mode = INDETERMINATE;
    this.reduce();
    if (isCleanBoundary(this.ringStart)) {
      this.rebuildIndeterminate();
      return;
    }
    warnRingIssue(
      this.warnCtx,
      "animator",
      "deferred-indeterminate",
      "setIndeterminate(true) deferred until the current sweep reaches a clean boundary",
    );
  }

  /** Animate toward `progress` in [0, 1]. Always rebuilds; never deferred. */
  setProgress(progress: number): void {
    const fraction = clamp01(progress);
    if (fraction !== progress) {
      warnRingIssue(
        this.warnCtx,
        "progress",
        "progress-range",
        `setProgress received ${String(progress)}; clamped to ${String(fraction)}`,
      );
    }
    this.lastProgress = fraction;
    this.mode = determinate(fraction);
    this.reduce();
    this.plan = this.installPlan(
      buildDeterminatePlan(this.getAngles(), fraction, this.durationMs),
    );
  }

  /**
   * Advance both edges by `elapsedMs` and re-arm the next indeterminate cycle
   * when the start edge finishes.
   *
   * @returns whether another frame is needed
   */
  tick(elapsedMs: number): boolean {
    if (!this.isRunning()) return false;

    this.ringStart = this.startTimeline.advance(elapsedMs);
    this.ringEnd = this.endTimeline.advance(elapsedMs);

    if (this.startEdgeCompleted) {
      this.startEdgeCompleted = false;
      if (this.mode.kind === "indeterminate") {
        this.reduce();
        this.rebuildIndeterminate();
      }
    }

    this.config.onInvalidate?.();
    return this.isRunning();
  }

  /** Accept ticks. A finished indeterminate plan is replaced by a fresh cycle. */
  start(): void {
    if (this.isRunning()) return;
    this.started = true;
    if (!this.startTimeline.isRunning() && this.mode.kind === "indeterminate") {
      this.reduce();
      this.rebuildIndeterminate();
    }
    this.config.onInvalidate?.();
  }

  /** Jump both edges to the end of the current plan and stop ticking. */
  stop(): void {
    this.started = false;
    this.startTimeline.end();
    this.endTimeline.end();
    this.startEdgeCompleted = false;
    this.ringStart = this.startTimeline.value();
    this.ringEnd = this.endTimeline.value();
  }

  isRunning(): boolean {
    return this.started && this.startTimeline.isRunning();
  }

  private reduce(): void {
    const reduced = reduceAngles(this.getAngles());
    this.ringStart = reduced.ringStart;
    this.ringEnd = reduced.ringEnd;
  }

  private rebuildIndeterminate(): void {
    this.plan = this.installPlan(
      buildIndeterminatePlan(this.getAngles(), this.durationMs, this.config.smallArcThreshold),
    );
  }

  private installPlan(plan: RingPlan): RingPlan {
    this.startTimeline.cancel();
    this.endTimeline.cancel();
    this.startEdgeCompleted = false;
    this.startTimeline.start(plan.startKeyframes, plan.durationMs);
    this.endTimeline.start(plan.endKeyframes, plan.durationMs);
    this.ringStart = this.startTimeline.value();
    this.ringEnd = this.endTimeline.value();
    return plan;
  }
}
