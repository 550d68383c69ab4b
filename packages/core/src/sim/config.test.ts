import { describe, expect, test } from 'vitest'
import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_PLATFORMER_TUNING,
  checkPlatformerTuning,
  resolveEngineConfig,
  resolvePlatformerTuning,
} from './config'
import { createGameWorld } from './world'
import { ConfigurationError } from '../errors'

describe('resolveEngineConfig', () => {
  test('returns the defaults when nothing is overridden', () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG)
    expect(DEFAULT_ENGINE_CONFIG.tickRate).toBe(60)
    expect(DEFAULT_ENGINE_CONFIG.gravity).toBe(1800)
  })

  test('merges overrides', () => {
    const config = resolveEngineConfig({ gravity: 0, debug: true })
    expect(config.gravity).toBe(0)
    expect(config.debug).toBe(true)
    expect(config.cellSize).toBe(DEFAULT_ENGINE_CONFIG.cellSize)
  })

  test('lists every invalid field', () => {
    let error: unknown
    try {
      resolveEngineConfig({ tickRate: 0, restitution: 2, maxSubSteps: 0.5 })
    } catch (err) {
      error = err
    }
    expect(error).toBeInstanceOf(ConfigurationError)
    if (!(error instanceof ConfigurationError)) return
    expect(error.problems).toEqual([
      'tickRate must be > 0 (got 0)',
      'restitution must be within [0, 1] (got 2)',
      'maxSubSteps must be an integer >= 1 (got 0.5)',
    ])
  })

  test('rejects non-finite numbers', () => {
    expect(() => resolveEngineConfig({ gravity: Number.NaN })).toThrow('gravity must be a finite number (got NaN)')
  })

  test('a world cannot be created from an invalid configuration', () => {
    expect(() => createGameWorld({ config: { cellSize: -8 } })).toThrow(ConfigurationError)
  })

  test('the world tick length follows the tick rate', () => {
    const world = createGameWorld({ config: { tickRate: 50 }, pools: { projectiles: 0, particles: 0 } })
    expect(world.dt).toBe(0.02)
  })
})

describe('platformer tuning', () => {
  test('defaults are valid', () => {
    expect(checkPlatformerTuning(DEFAULT_PLATFORMER_TUNING)).toEqual([])
  })

  test('overrides merge onto the defaults', () => {
    const tuning = resolvePlatformerTuning({ maxSpeed: 100 })
    expect(tuning.maxSpeed).toBe(100)
    expect(tuning.jumpSpeed).toBe(DEFAULT_PLATFORMER_TUNING.jumpSpeed)
  })

  test('out-of-range values are reported', () => {
    expect(checkPlatformerTuning({ ...DEFAULT_PLATFORMER_TUNING, jumpBufferTime: -0.1, groundFriction: 1.5 })).toEqual([
      'jumpBufferTime must be >= 0 (got -0.1)',
      'groundFriction must be within [0, 1] (got 1.5)',
    ])
    expect(() => resolvePlatformerTuning({ airFriction: Number.POSITIVE_INFINITY })).toThrow(ConfigurationError)
  })
})
