/**
 * GameLoop - Fixed timestep game loop
 *
 * Implements the accumulator pattern for fixed timestep simulation
 * with interpolation for smooth rendering at any frame rate.
 *
 * Reference: https://gafferongames.com/post/fix_your_timestep/
 */

import { MAX_SUB_STEPS, TICK_MS, createLogger, type Logger } from '@brickyard/core'
import { timeoutScheduler, type FrameScheduler } from './FrameScheduler'

export type UpdateCallback = (dt: number) => void
export type RenderCallback = (alpha: number) => void

/** Longest wall-clock gap a single frame may feed into the accumulator */
export const MAX_FRAME_DELTA_MS = 250

export interface GameLoopOptions {
  /** Fixed tick length in milliseconds */
  tickMs?: number
  /** Maximum fixed updates per frame */
  maxSubSteps?: number
  scheduler?: FrameScheduler
  /** Clock in milliseconds */
  now?: () => number
  /** Runs at the start of every frame, before any update */
  onFrameStart?: () => void
  log?: Logger
}

/**
 * Fixed timestep game loop with interpolation
 */
export class GameLoop {
  private accumulator = 0
  private lastTime = 0
  private running = false
  private cancelFrame: (() => void) | null = null

  private _tick = 0
  private _frameCount = 0
  private _fps = 0
  private _droppedMs = 0

  private fpsAccumulator = 0
  private fpsFrames = 0

  private readonly tickMs: number
  private readonly maxSubSteps: number
  private readonly scheduler: FrameScheduler
  private readonly now: () => number
  private readonly onFrameStart: (() => void) | undefined
  private readonly log: Logger

  constructor(
    private readonly onUpdate: UpdateCallback,
    private readonly onRender: RenderCallback,
    options: GameLoopOptions = {}
  ) {
    this.tickMs = options.tickMs ?? TICK_MS
    this.maxSubSteps = options.maxSubSteps ?? MAX_SUB_STEPS
    if (!(this.tickMs > 0)) throw new RangeError(`tickMs must be > 0 (got ${this.tickMs})`)
    if (!Number.isInteger(this.maxSubSteps) || this.maxSubSteps < 1) {
      throw new RangeError(`maxSubSteps must be an integer >= 1 (got ${this.maxSubSteps})`)
    }
    this.scheduler = options.scheduler ?? timeoutScheduler(this.tickMs)
    this.now = options.now ?? (() => performance.now())
    this.onFrameStart = options.onFrameStart
    this.log = options.log ?? createLogger('loop')
  }

  /** Current tick count */
  get tick(): number {
    return this._tick
  }

  /** Frames rendered */
  get frameCount(): number {
    return this._frameCount
  }

  /** Current FPS (updated every second) */
  get fps(): number {
    return this._fps
  }

  /** Wall-clock time thrown away by the frame delta cap and the sub-step cap */
  get droppedMs(): number {
    return this._droppedMs
  }

  /** Time waiting in the accumulator, below one tick between frames */
  get pendingMs(): number {
    return this.accumulator
  }

  /**
   * Start the game loop
   */
  start(): void {
    if (this.running) return

    this.running = true
    this.lastTime = this.now()
    this.accumulator = 0
    this.log.debug({ tickMs: this.tickMs, maxSubSteps: this.maxSubSteps }, 'loop started')

    this.loop(this.lastTime)
  }

  /**
   * Stop the game loop
   */
  stop(): void {
    if (!this.running) return
    this.running = false
    if (this.cancelFrame !== null) {
      this.cancelFrame()
      this.cancelFrame = null
    }
    this.log.debug({ tick: this._tick, frames: this._frameCount }, 'loop stopped')
  }

  /**
   * Check if loop is running
   */
  isRunning(): boolean {
    return this.running
  }

  /**
   * Run one frame for `deltaMs` of elapsed wall-clock time: zero or more
   * fixed updates, then one render.
   *
   * @returns number of fixed updates run
   */
  advance(deltaMs: number): number {
    // A clock that jumps backwards or returns garbage contributes nothing
    const deltaTime = Number.isFinite(deltaMs) && deltaMs > 0 ? deltaMs : 0

    this.onFrameStart?.()

    // Cap delta time to prevent spiral of death
    // If frame took > 250ms, we're probably in a background tab
    const cappedDelta = Math.min(deltaTime, MAX_FRAME_DELTA_MS)
    this._droppedMs += deltaTime - cappedDelta
    this.accumulator += cappedDelta

    let steps = 0
    while (this.accumulator >= this.tickMs && steps < this.maxSubSteps) {
      this.onUpdate(this.tickMs / 1000)
      this.accumulator -= this.tickMs
      this._tick++
      steps++
    }

    // If we hit the cap, everything still accumulated is discarded, the
    // sub-tick remainder included
    if (steps >= this.maxSubSteps && this.accumulator >= this.tickMs) {
      this._droppedMs += this.accumulator
      this.accumulator = 0
    }

    // Calculate interpolation alpha (0 to 1)
    // This represents how far we are between ticks
    const alpha = this.accumulator / this.tickMs

    this.onRender(alpha)
    this._frameCount++

    this.fpsAccumulator += deltaTime
    this.fpsFrames++
    if (this.fpsAccumulator >= 1000) {
      this._fps = Math.round((this.fpsFrames * 1000) / this.fpsAccumulator)
      this.fpsAccumulator = 0
      this.fpsFrames = 0
    }

    return steps
  }

  /**
   * Main loop iteration
   */
  private loop = (currentTime: number): void => {
    if (!this.running) return

    const deltaTime = currentTime - this.lastTime
    this.lastTime = currentTime

    try {
      this.advance(deltaTime)
    } catch (err) {
      this.stop()
      this.log.error({ err, tick: this._tick }, 'frame failed, loop stopped')
      throw err
    }

    // stop() may have been called from inside the frame
    if (!this.running) return
    this.cancelFrame = this.scheduler.schedule(this.loop)
  }
}
