/**
 * packages/core/src/ring/updateQueue.ts — Mailbox for off-loop updates.
 *
 * Why: The animator is only safe to touch from the frame loop. Updates raised
 * anywhere else are buffered here and applied in arrival order on the next
 * drain, either a posted one (`schedule`) or the host's next frame.
 */

export type RingUpdateQueueOptions = Readonly<{
  /** Post `drain` to run later on the frame loop's context. */
  schedule?: (drain: () => void) => void;
}>;

export class RingUpdateQueue<T> {
  private readonly schedule: ((drain: () => void) => void) | undefined;
  private readonly pending: T[] = [];
  private scheduled = false;
  private scheduleToken = 0;

  constructor(opts: RingUpdateQueueOptions = {}) {
    this.schedule = opts.schedule;
  }

  get size(): number {
    return this.pending.length;
  }

  isScheduled(): boolean {
    return this.scheduled;
  }

  enqueue(update: T): void {
    this.pending.push(update);
  }

  /**
   * Post one drain through `schedule` unless one is already pending.
   *
   * @returns whether a drain was posted by this call
   */
  requestDrain(apply: (update: T) => void): boolean {
    if (this.schedule === undefined || this.scheduled) return false;
    this.scheduled = true;
    const token = this.scheduleToken;
    this.schedule(() => {
      if (token !== this.scheduleToken) return;
      this.drain(apply);
    });
    return true;
  }

  /**
   * Apply every buffered update in order, including ones enqueued while draining.
   *
   * @returns number of updates applied
   */
  drain(apply: (update: T) => void): number {
    this.cancelScheduled();
    let applied = 0;
    while (this.pending.length > 0) {
      const batch = this.pending.splice(0);
      for (const update of batch) {
        apply(update);
        applied++;
      }
    }
    return applied;
  }

  /** Forget the posted drain, if any. Buffered updates stay for the next drain. */
  cancelScheduled(): void {
    this.scheduled = false;
    this.scheduleToken++;
  }

  clear(): void {
    this.pending.length = 0;
    this.cancelScheduled();
  }
}
