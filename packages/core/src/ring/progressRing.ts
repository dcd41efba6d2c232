/**
 * packages/core/src/ring/progressRing.ts — Host-side progress ring controller.
 *
 * Why: Hosts think in integer progress within a [min, max] range, attach and
 * detach widgets, and hide them. This controller maps all of that onto one
 * RingAnimator: it scales progress to a fraction, buffers off-loop updates,
 * and only lets the animation run while attached and visible.
 *
 * Drive it by calling `frame(elapsedMs)` whenever `onInvalidate` fires until it
 * returns false; `createRingTicker` does exactly that.
 */

import type { RingAngles } from "./angles.js";
import { type RingArc, ringArc } from "./arc.js";
import type { RingAnimatorConfig } from "./config.js";
import { RingAnimator } from "./ringAnimator.js";
import type { RingSavedState } from "./savedState.js";
import { RingUpdateQueue } from "./updateQueue.js";

export type LayoutDirection = "ltr" | "rtl";

export type ProgressRingConfig = Readonly<{
  min?: number;
  max?: number;
  progress?: number;
  indeterminate?: boolean;
  /** Mirror the arc when the layout direction is right-to-left. */
  mirrorForRtl?: boolean;
  layoutDirection?: LayoutDirection;
  /** Redraw request; the host should schedule `frame`. */
  onInvalidate?: () => void;
  /** Post a deferred-update drain onto the frame loop's context. */
  schedule?: (drain: () => void) => void;
  animator?: Omit<RingAnimatorConfig, "autoStart" | "indeterminate" | "progress" | "onInvalidate">;
}>;

export type SetProgressOptions = Readonly<{
  /** Called from outside the frame loop: buffer until the next drain. */
  deferred?: boolean;
}>;

const DEFAULT_MIN = 0;
const DEFAULT_MAX = 100;

function constrain(amount: number, low: number, high: number): number {
  return amount < low ? low : amount > high ? high : amount;
}

function toInt(v: number | undefined, fallback: number): number {
  if (v === undefined || !Number.isFinite(v)) return fallback;
  return Math.trunc(v);
}

export class ProgressRing {
  private readonly animator: RingAnimator;
  private readonly queue: RingUpdateQueue<number>;
  private readonly onInvalidate: (() => void) | undefined;
  private readonly mirrorForRtl: boolean;

  private min: number;
  private max: number;
  private progress: number;
  private indeterminate: boolean;
  private layoutDirection: LayoutDirection;
  private attached = false;
  private visible = true;
  private shouldStartAnimator = false;

  constructor(config: ProgressRingConfig = {}) {
    this.min = toInt(config.min, DEFAULT_MIN);
    this.max = Math.max(this.min, toInt(config.max, DEFAULT_MAX));
    this.progress = constrain(toInt(config.progress, this.min), this.min, this.max);
    this.indeterminate = config.indeterminate ?? false;
    this.mirrorForRtl = config.mirrorForRtl ?? false;
    this.layoutDirection = config.layoutDirection ?? "ltr";
    this.onInvalidate = config.onInvalidate;
    this.queue = new RingUpdateQueue<number>(
      config.schedule === undefined ? {} : { schedule: config.schedule },
    );

    const onInvalidate = config.onInvalidate;
    this.animator = new RingAnimator({
      ...config.animator,
      indeterminate: this.indeterminate,
      progress: this.scale(this.progress),
      autoStart: false,
      ...(onInvalidate === undefined ? {} : { onInvalidate }),
    });
  }

  getMin(): number {
    return this.min;
  }

  getMax(): number {
    return this.max;
  }

  /** Current progress; 0 while indeterminate. */
  getProgress(): number {
    return this.indeterminate ? 0 : this.progress;
  }

  isIndeterminate(): boolean {
    return this.indeterminate;
  }

  isAttached(): boolean {
    return this.attached;
  }

  isVisible(): boolean {
    return this.visible;
  }

  getAnimator(): RingAnimator {
    return this.animator;
  }

  /** Updates still waiting for a drain. */
  pendingUpdates(): number {
    return this.queue.size;
  }

  /**
   * Switch modes. Buffered progress updates are applied first so they cannot
   * land after, and undo, the switch. Leaving indeterminate mode resumes the
   * current progress within the current range.
   */
  setIndeterminate(indeterminate: boolean): void {
    this.drainUpdates();
    this.indeterminate = indeterminate;
    if (!indeterminate && this.animator.isIndeterminate()) {
      this.animator.setProgress(this.scale(this.progress));
    } else {
      this.animator.setIndeterminate(indeterminate);
    }
    this.startAnimation();
  }

  /** Non-finite values are ignored. */
  setProgress(progress: number, opts: SetProgressOptions = {}): void {
    if (!Number.isFinite(progress)) return;
    const next = constrain(Math.trunc(progress), this.min, this.max);
    if (next === this.progress && !this.indeterminate) return;
    this.progress = next;
    this.indeterminate = false;
    this.refreshProgress(next, opts.deferred === true);
  }

  incrementProgressBy(diff: number): void {
    this.setProgress(this.progress + diff);
  }

  /**
   * Lower bound; never above `max`. Progress below it is raised to it.
   * While indeterminate only the stored progress changes.
   */
  setMin(min: number): void {
    if (!Number.isFinite(min)) return;
    const next = Math.min(Math.trunc(min), this.max);
    if (next === this.min) return;
    this.min = next;
    if (this.progress < next) this.progress = next;
    if (!this.indeterminate) this.refreshProgress(this.progress, false);
  }

  /** Upper bound; never below `min`. Progress above it is lowered to it. */
  setMax(max: number): void {
    if (!Number.isFinite(max)) return;
    const next = Math.max(Math.trunc(max), this.min);
    if (next === this.max) return;
    this.max = next;
    if (this.progress > next) this.progress = next;
    if (!this.indeterminate) this.refreshProgress(this.progress, false);
  }

  setLayoutDirection(direction: LayoutDirection): void {
    if (direction === this.layoutDirection) return;
    this.layoutDirection = direction;
    this.onInvalidate?.();
  }

  /** Start animating and apply updates buffered while detached. */
  attach(): void {
    this.startAnimation();
    this.drainUpdates();
    this.attached = true;
  }

  detach(): void {
    this.stopAnimation();
    this.queue.cancelScheduled();
    this.attached = false;
  }

  setVisible(visible: boolean): void {
    if (visible === this.visible) return;
    this.visible = visible;
    if (visible) {
      this.startAnimation();
    } else {
      this.stopAnimation();
    }
  }

  /**
   * Run one frame: apply buffered updates, start the animator if asked to,
   * then advance it.
   *
   * @returns whether another frame is needed
   */
  frame(elapsedMs: number): boolean {
    this.drainUpdates();
    if (this.shouldStartAnimator) {
      this.shouldStartAnimator = false;
      this.animator.start();
    }
    return this.animator.tick(elapsedMs);
  }

  isAnimating(): boolean {
    return this.animator.isRunning() && this.attached && this.visible;
  }

  getAngles(): RingAngles {
    return this.animator.getAngles();
  }

  getArc(): RingArc {
    return ringArc(this.animator.getAngles(), {
      mirror: this.mirrorForRtl && this.layoutDirection === "rtl",
    });
  }

  saveState(): RingSavedState {
    return Object.freeze({ progress: this.progress, indeterminate: this.indeterminate });
  }

  restoreState(state: RingSavedState): void {
    this.setProgress(state.progress);
    this.setIndeterminate(state.indeterminate);
  }

  private scale(progress: number): number {
    const range = this.max - this.min;
    return range > 0 ? (progress - this.min) / range : 0;
  }

  private refreshProgress(progress: number, deferred: boolean): void {
    if (!deferred) {
      this.applyProgress(progress);
      return;
    }
    this.queue.enqueue(progress);
    if (this.attached) {
      this.queue.requestDrain((update) => {
        this.applyProgress(update);
      });
    }
  }

  private drainUpdates(): void {
    this.queue.drain((update) => {
      this.applyProgress(update);
    });
  }

  private applyProgress(progress: number): void {
    this.animator.setProgress(this.scale(progress));
    this.startAnimation();
  }

  private startAnimation(): void {
    if (!this.visible) return;
    this.shouldStartAnimator = true;
    this.onInvalidate?.();
  }

  private stopAnimation(): void {
    this.animator.stop();
    this.shouldStartAnimator = false;
    this.onInvalidate?.();
  }
}
