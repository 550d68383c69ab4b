/**
 * GameHost - wires a simulation to the loop, input, assets and a renderer
 *
 * Per frame: clear last frame's events, sample input once, run the fixed
 * ticks the loop asks for, then publish the final tick's state together with
 * the interpolation alpha. Nothing here waits on asset loads; entities whose
 * asset is still pending are simply absent from the frame.
 */

import {
  beginFrame,
  createInputState,
  createLogger,
  publishFrame,
  type AssetResolver,
  type InputState,
  type Logger,
  type RenderFrame,
  type Simulation,
} from '@brickyard/core'
import { GameLoop, type GameLoopOptions } from './GameLoop'
import { SimulationDriver } from './SimulationDriver'
import type { InputSource } from './InputLatch'

export interface HostFrame<H> extends RenderFrame<H> {
  /** Fraction of a tick the accumulator holds after this frame's ticks */
  alpha: number
}

/** Receives one frame per loop iteration */
export type FrameSink<H> = (frame: HostFrame<H>) => void

export interface GameHostOptions<H> {
  input: InputSource
  assets: AssetResolver<H>
  render: FrameSink<H>
  /** Scheduler and clock for the loop; tick length and sub-step cap come from the world config */
  loop?: Pick<GameLoopOptions, 'scheduler' | 'now'>
  log?: Logger
}

export class GameHost<H> {
  readonly loop: GameLoop

  private readonly sim: Simulation
  private readonly driver: SimulationDriver
  private readonly inputSource: InputSource
  private readonly assets: AssetResolver<H>
  private readonly render: FrameSink<H>

  private frameInput: InputState = createInputState()
  private sampled = false

  constructor(sim: Simulation, options: GameHostOptions<H>) {
    this.sim = sim
    this.driver = new SimulationDriver(sim)
    this.inputSource = options.input
    this.assets = options.assets
    this.render = options.render

    this.loop = new GameLoop(this.onUpdate, this.onRender, {
      ...options.loop,
      tickMs: this.driver.tickMs,
      maxSubSteps: this.driver.maxSubSteps,
      onFrameStart: this.onFrameStart,
      log: options.log ?? createLogger('loop'),
    })
  }

  start(): void {
    this.loop.start()
  }

  stop(): void {
    this.loop.stop()
  }

  /** Run one frame by hand (headless hosts, tests) */
  advance(deltaMs: number): number {
    return this.loop.advance(deltaMs)
  }

  private onFrameStart = (): void => {
    beginFrame(this.sim.world)
    this.sampled = false
  }

  private onUpdate = (): void => {
    // Sampled on the frame's first tick so a tap during a tick-less frame
    // stays latched for the next one
    if (!this.sampled) {
      this.frameInput = this.inputSource.sample()
      this.sampled = true
    }
    this.driver.step(this.frameInput)
  }

  private onRender = (alpha: number): void => {
    const frame = publishFrame(this.sim.world, this.assets)
    this.render({ ...frame, alpha })
  }
}
