/**
 * Input snapshot types
 *
 * The platform layer samples and debounces devices; the simulation only ever
 * sees one InputState per frame made of logical axes and button bits.
 */

/** Button bit flags */
export const Button = {
  JUMP: 1 << 0,
  FIRE: 1 << 1,
} as const

export type ButtonFlag = (typeof Button)[keyof typeof Button]

export type InputState = {
  /** Bit flags for held buttons */
  buttons: number
  /** Horizontal axis in [-1, 1] */
  moveX: number
  /** Vertical axis in [-1, 1] (unused by the platformer, kept for other controllers) */
  moveY: number
}

/** Create a default (empty) input state */
export function createInputState(): InputState {
  return { buttons: 0, moveX: 0, moveY: 0 }
}

export function hasButton(input: InputState, flag: ButtonFlag): boolean {
  return (input.buttons & flag) !== 0
}

/** Copy `src` into `out` without allocating */
export function copyInputState(out: InputState, src: Readonly<InputState>): InputState {
  out.buttons = src.buttons
  out.moveX = src.moveX
  out.moveY = src.moveY
  return out
}
