/**
 * packages/core/src/ring/ticker.ts — Timer-driven frame loop.
 *
 * Why: The animator only moves when ticked. The ticker calls `onFrame` with
 * the time since the previous frame until the frame reports nothing is left
 * to animate. Clock and scheduler are injectable so tests can drive frames
 * by hand.
 */

/** Schedule `callback` after `delayMs`; returns a function that cancels it. */
export type FrameScheduler = (callback: () => void, delayMs: number) => () => void;

export type RingTickerOptions = Readonly<{
  /** Called once per frame; return false to stop the loop. */
  onFrame: (elapsedMs: number) => boolean;
  /** Target frame interval in milliseconds. */
  frameMs?: number;
  now?: () => number;
  schedule?: FrameScheduler;
}>;

export type RingTicker = Readonly<{
  /** Begin the loop. No-op while already active. */
  start: () => void;
  stop: () => void;
  isActive: () => boolean;
}>;

const DEFAULT_FRAME_MS = 16;

function nowMs(): number {
  const perf = (globalThis as { performance?: { now?: () => number } }).performance;
  const perfNow = perf?.now;
  if (typeof perfNow === "function") return perfNow.call(perf);
  return Date.now();
}

function timerSchedule(callback: () => void, delayMs: number): () => void {
  const timeoutId: ReturnType<typeof setTimeout> = setTimeout(callback, delayMs);
  return () => {
    clearTimeout(timeoutId);
  };
}

export function createRingTicker(options: RingTickerOptions): RingTicker {
  const frameMs =
    typeof options.frameMs === "number" && Number.isFinite(options.frameMs)
      ? Math.max(1, Math.trunc(options.frameMs))
      : DEFAULT_FRAME_MS;
  const now = options.now ?? nowMs;
  const schedule = options.schedule ?? timerSchedule;

  let active = false;
  let lastFrameMs = 0;
  let cancelPending: (() => void) | null = null;

  const frame = () => {
    cancelPending = null;
    if (!active) return;
    const t = now();
    const elapsedMs = Math.max(0, t - lastFrameMs);
    lastFrameMs = t;

    let keepGoing = false;
    try {
      keepGoing = options.onFrame(elapsedMs);
    } finally {
      if (!keepGoing) active = false;
    }
    if (active && cancelPending === null) {
      cancelPending = schedule(frame, frameMs);
    }
  };

  return Object.freeze({
    start: () => {
      if (active) return;
      active = true;
      lastFrameMs = now();
      cancelPending = schedule(frame, frameMs);
    },
    stop: () => {
      active = false;
      if (cancelPending !== null) {
        cancelPending();
        cancelPending = null;
      }
    },
    isActive: () => active,
  });
}
