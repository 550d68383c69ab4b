/**
 * InputLatch - debounced input handed to the simulation once per frame
 *
 * The platform layer reports presses, releases and axis values as they
 * happen. A press and release that both land between two samples still
 * shows up as a one-sample pulse, so quick taps are never lost.
 */

import { createInputState, type ButtonFlag, type InputState } from '@brickyard/core'

/** Anything the host can pull one input snapshot per frame from */
export interface InputSource {
  sample(): InputState
}

function clampAxis(value: number): number {
  if (!Number.isFinite(value)) return 0
  return Math.max(-1, Math.min(1, value))
}

export class InputLatch implements InputSource {
  private held = 0
  /** One-sample edge buffer for presses that may be released before the next sample */
  private transientButtons = 0
  private moveX = 0
  private moveY = 0

  press(flag: ButtonFlag): void {
    this.held |= flag
    this.transientButtons |= flag
  }

  release(flag: ButtonFlag): void {
    this.held &= ~flag
  }

  /** Axis values are clamped to [-1, 1] */
  setAxes(moveX: number, moveY = 0): void {
    this.moveX = clampAxis(moveX)
    this.moveY = clampAxis(moveY)
  }

  isHeld(flag: ButtonFlag): boolean {
    return (this.held & flag) !== 0
  }

  /**
   * Build the snapshot for this frame
   */
  sample(): InputState {
    const input = createInputState()
    input.buttons = this.held | this.transientButtons
    input.moveX = this.moveX
    input.moveY = this.moveY

    // One-shot consumption: hold-state is still sourced from `held`
    this.transientButtons = 0
    return input
  }

  /** Forget everything, e.g. when the window loses focus */
  reset(): void {
    this.held = 0
    this.transientButtons = 0
    this.moveX = 0
    this.moveY = 0
  }
}
