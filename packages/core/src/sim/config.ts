/**
 * Engine configuration
 *
 * Defaults come from content/physics.ts. Overrides are validated once, when a
 * world is created; a bad value never reaches a running tick.
 */

import { ConfigurationError } from '../errors'
import {
  TICK_RATE,
  MAX_SUB_STEPS,
  GRAVITY,
  MAX_FALL_SPEED,
  MAX_HORIZONTAL_SPEED,
  CELL_SIZE,
  CONTACT_SKIN,
  RESTITUTION,
  GROUND_DRAG,
  STOP_SPEED,
} from './content/physics'
import {
  PLATFORMER_MAX_SPEED,
  PLATFORMER_JUMP_SPEED,
  COYOTE_TIME,
  JUMP_BUFFER_TIME,
  GROUND_FRICTION,
  AIR_FRICTION,
} from './content/platformer'

export interface EngineConfig {
  /** Fixed ticks per second */
  tickRate: number
  /** Sub-step cap per render frame */
  maxSubSteps: number
  /** Downward acceleration (px/s^2) */
  gravity: number
  /** Terminal fall speed (px/s) */
  maxFallSpeed: number
  /** Horizontal speed clamp (px/s) */
  maxHorizontalSpeed: number
  /** Broad-phase cell size (px) */
  cellSize: number
  /** Touching tolerance for contacts (px) */
  contactSkin: number
  /** Normal restitution in [0, 1] */
  restitution: number
  /** Per-tick horizontal drag for resting bodies without a controller, in [0, 1] */
  groundDrag: number
  /** Speeds below this snap to zero (px/s) */
  stopSpeed: number
  /** Invariant violations throw instead of logging */
  debug: boolean
  /** Seed for the world RNG */
  seed: number
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  tickRate: TICK_RATE,
  maxSubSteps: MAX_SUB_STEPS,
  gravity: GRAVITY,
  maxFallSpeed: MAX_FALL_SPEED,
  maxHorizontalSpeed: MAX_HORIZONTAL_SPEED,
  cellSize: CELL_SIZE,
  contactSkin: CONTACT_SKIN,
  restitution: RESTITUTION,
  groundDrag: GROUND_DRAG,
  stopSpeed: STOP_SPEED,
  debug: false,
  seed: 1,
})

type NumericKey = { [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never }[keyof EngineConfig]

const POSITIVE: readonly NumericKey[] = ['tickRate', 'maxFallSpeed', 'maxHorizontalSpeed', 'cellSize']
const NON_NEGATIVE: readonly NumericKey[] = ['gravity', 'contactSkin', 'stopSpeed']
const UNIT_INTERVAL: readonly NumericKey[] = ['restitution', 'groundDrag']

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides }
  const problems: string[] = []

  for (const key of [...POSITIVE, ...NON_NEGATIVE, ...UNIT_INTERVAL, 'maxSubSteps', 'seed'] as const) {
    if (!Number.isFinite(config[key])) problems.push(`${key} must be a finite number (got ${config[key]})`)
  }
  for (const key of POSITIVE) {
    if (config[key] <= 0) problems.push(`${key} must be > 0 (got ${config[key]})`)
  }
  for (const key of NON_NEGATIVE) {
    if (config[key] < 0) problems.push(`${key} must be >= 0 (got ${config[key]})`)
  }
  for (const key of UNIT_INTERVAL) {
    if (config[key] < 0 || config[key] > 1) problems.push(`${key} must be within [0, 1] (got ${config[key]})`)
  }
  if (!Number.isInteger(config.maxSubSteps) || config.maxSubSteps < 1) {
    problems.push(`maxSubSteps must be an integer >= 1 (got ${config.maxSubSteps})`)
  }

  if (problems.length > 0) throw new ConfigurationError('EngineConfig', problems)
  return config
}

// ============================================================================
// Platformer tuning
// ============================================================================

/** Per-entity platformer tuning, copied into the Platformer table on attach */
export interface PlatformerTuning {
  /** Run speed at full input (px/s) */
  maxSpeed: number
  /** Jump launch speed (px/s) */
  jumpSpeed: number
  /** Seconds after leaving ground a jump still fires */
  coyoteTime: number
  /** Seconds a jump press is remembered before landing */
  jumpBufferTime: number
  /** Fraction of horizontal speed removed per tick on the ground without input */
  groundFriction: number
  /** Same, in the air */
  airFriction: number
}

export const DEFAULT_PLATFORMER_TUNING: Readonly<PlatformerTuning> = Object.freeze({
  maxSpeed: PLATFORMER_MAX_SPEED,
  jumpSpeed: PLATFORMER_JUMP_SPEED,
  coyoteTime: COYOTE_TIME,
  jumpBufferTime: JUMP_BUFFER_TIME,
  groundFriction: GROUND_FRICTION,
  airFriction: AIR_FRICTION,
})

const TUNING_KEYS = [
  'maxSpeed',
  'jumpSpeed',
  'coyoteTime',
  'jumpBufferTime',
  'groundFriction',
  'airFriction',
] as const satisfies readonly (keyof PlatformerTuning)[]

/** Problems with a tuning override, empty when valid */
export function checkPlatformerTuning(tuning: PlatformerTuning): string[] {
  const problems: string[] = []
  for (const key of TUNING_KEYS) {
    if (!Number.isFinite(tuning[key])) problems.push(`${key} must be a finite number (got ${tuning[key]})`)
  }
  if (tuning.maxSpeed < 0) problems.push(`maxSpeed must be >= 0 (got ${tuning.maxSpeed})`)
  if (tuning.jumpSpeed < 0) problems.push(`jumpSpeed must be >= 0 (got ${tuning.jumpSpeed})`)
  if (tuning.coyoteTime < 0) problems.push(`coyoteTime must be >= 0 (got ${tuning.coyoteTime})`)
  if (tuning.jumpBufferTime < 0) problems.push(`jumpBufferTime must be >= 0 (got ${tuning.jumpBufferTime})`)
  for (const key of ['groundFriction', 'airFriction'] as const) {
    if (tuning[key] < 0 || tuning[key] > 1) problems.push(`${key} must be within [0, 1] (got ${tuning[key]})`)
  }
  return problems
}

/**
 * Merge overrides onto the platformer defaults.
 * @throws ConfigurationError when a value is out of range
 */
export function resolvePlatformerTuning(overrides: Partial<PlatformerTuning> = {}): PlatformerTuning {
  const tuning: PlatformerTuning = { ...DEFAULT_PLATFORMER_TUNING, ...overrides }
  const problems = checkPlatformerTuning(tuning)
  if (problems.length > 0) throw new ConfigurationError('PlatformerTuning', problems)
  return tuning
}
