/**
 * Frame scheduling for the game loop.
 *
 * A browser host passes a requestAnimationFrame-backed scheduler; the default
 * paces frames with timers so the loop also runs under Node.
 */

export interface FrameScheduler {
  /**
   * Call `callback` with the current time in milliseconds once the next frame
   * is due.
   * @returns a function that cancels the pending call
   */
  schedule(callback: (time: number) => void): () => void
}

/** Timer-paced frames at roughly `intervalMs` apart */
export function timeoutScheduler(intervalMs: number, now: () => number = () => performance.now()): FrameScheduler {
  return {
    schedule(callback) {
      const handle = setTimeout(() => callback(now()), intervalMs)
      return () => clearTimeout(handle)
    },
  }
}

/**
 * Scheduler driven by hand, for tests and headless hosts: frames run only when
 * `runFrame` is called.
 */
export class ManualScheduler implements FrameScheduler {
  private pending: ((time: number) => void) | null = null

  schedule(callback: (time: number) => void): () => void {
    this.pending = callback
    return () => {
      if (this.pending === callback) this.pending = null
    }
  }

  get hasPendingFrame(): boolean {
    return this.pending !== null
  }

  /**
   * Run the pending frame at `time`
   * @returns false when nothing was scheduled
   */
  runFrame(time: number): boolean {
    const callback = this.pending
    if (!callback) return false
    this.pending = null
    callback(time)
    return true
  }
}
