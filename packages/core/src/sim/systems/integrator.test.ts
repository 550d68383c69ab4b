import { beforeEach, describe, expect, test } from 'vitest'
import { createGameWorld, type GameWorld } from '../world'
import { spawnDynamicBody, spawnPlatformer, spawnStaticBody } from '../prefabs'
import { integratorSystem } from './integrator'
import { Body, Transform, Velocity } from '../components'
import { TICK_S } from '../step'

describe('integratorSystem', () => {
  let world: GameWorld
  let eid: number

  beforeEach(() => {
    world = createGameWorld({ pools: { projectiles: 0, particles: 0 } })
    eid = spawnDynamicBody(world, 0, 0, { width: 32, height: 32 })
  })

  test('applies gravity to velocity before moving', () => {
    integratorSystem(world, TICK_S)

    expect(Velocity.y[eid]).toBeCloseTo(30, 4)
    expect(Transform.y[eid]).toBeCloseTo(0.5, 5)
    expect(Transform.prevY[eid]).toBe(0)
  })

  test('scales gravity per body', () => {
    Body.gravityScale[eid] = 0
    integratorSystem(world, TICK_S)
    expect(Velocity.y[eid]).toBe(0)
    expect(Transform.y[eid]).toBe(0)
  })

  test('grounded bodies get no gravity', () => {
    Body.grounded[eid] = 1
    integratorSystem(world, TICK_S)
    expect(Velocity.y[eid]).toBe(0)
    expect(Transform.y[eid]).toBe(0)
  })

  test('moves by velocity times dt', () => {
    Body.gravityScale[eid] = 0
    Velocity.x[eid] = 120
    integratorSystem(world, TICK_S)
    expect(Transform.x[eid]).toBeCloseTo(2, 5)
    expect(Transform.prevX[eid]).toBe(0)
  })

  test('clamps fall speed and horizontal speed', () => {
    Velocity.x[eid] = -5000
    Velocity.y[eid] = 5000
    integratorSystem(world, TICK_S)
    expect(Velocity.x[eid]).toBe(-1200)
    expect(Velocity.y[eid]).toBe(900)
  })

  test('grounded bodies without a controller slow down and stop', () => {
    Body.grounded[eid] = 1
    Velocity.x[eid] = 100
    integratorSystem(world, TICK_S)
    expect(Velocity.x[eid]).toBe(75)

    for (let i = 0; i < 30; i++) integratorSystem(world, TICK_S)
    expect(Velocity.x[eid]).toBe(0)
  })

  test('controlled bodies keep their horizontal speed on the ground', () => {
    const player = spawnPlatformer(world, 0, 0, { width: 32, height: 32 })
    Body.grounded[player] = 1
    Velocity.x[player] = 100
    integratorSystem(world, TICK_S)
    expect(Velocity.x[player]).toBe(100)
  })

  test('static bodies never move', () => {
    const wall = spawnStaticBody(world, 50, 50, 10, 10)
    integratorSystem(world, TICK_S)
    expect(Transform.x[wall]).toBe(50)
    expect(Transform.y[wall]).toBe(50)
  })

  describe('numerical instability', () => {
    test('non-finite velocity is reset to zero and reported', () => {
      Body.grounded[eid] = 1
      Transform.x[eid] = 10
      Velocity.x[eid] = Number.NaN
      Velocity.y[eid] = Number.POSITIVE_INFINITY

      integratorSystem(world, TICK_S)

      expect(Velocity.x[eid]).toBe(0)
      expect(Velocity.y[eid]).toBe(0)
      expect(Transform.x[eid]).toBe(10)
      expect(world.frame.diagnostics.map((d) => [d.kind, d.eid])).toEqual([['numerical', eid]])
    })

    test('a non-finite position is restored to the last valid one', () => {
      Body.grounded[eid] = 1
      Transform.prevX[eid] = 5
      Transform.x[eid] = Number.POSITIVE_INFINITY

      integratorSystem(world, TICK_S)

      expect(Transform.x[eid]).toBe(5)
      expect(Velocity.x[eid]).toBe(0)
      expect(world.frame.diagnostics[0]?.kind).toBe('numerical')
    })

    test('the body stays in the world and recovers', () => {
      Velocity.y[eid] = Number.NaN
      integratorSystem(world, TICK_S)
      integratorSystem(world, TICK_S)
      expect(Number.isFinite(Transform.y[eid])).toBe(true)
      expect(Velocity.y[eid]).toBeGreaterThan(0)
    })
  })
})
