import { beforeEach, describe, expect, test, vi } from 'vitest'
import { entityExists } from 'bitecs'
import { createGameWorld, beginFrame, type GameWorld } from '../world'
import { spawnDynamicBody, spawnProjectile, spawnStaticBody, spawnTrigger, CollisionLayer } from '../prefabs'
import { spatialHashSystem } from './spatialHash'
import { collisionSystem } from './collision'
import { Body, NO_OWNER, Transform, Velocity } from '../components'
import { despawnEntity } from '../entities'
import { liveContacts } from '../events'
import { TICK_S } from '../step'

function runCollision(world: GameWorld): void {
  world.contacts.count = 0
  spatialHashSystem(world, TICK_S)
  collisionSystem(world, TICK_S)
}

function actor(world: GameWorld, x: number, y: number, size = 32): number {
  return spawnDynamicBody(world, x, y, {
    width: size,
    height: size,
    layer: CollisionLayer.ACTOR,
    mask: CollisionLayer.WORLD | CollisionLayer.ACTOR,
  })
}

describe('collisionSystem', () => {
  let world: GameWorld

  beforeEach(() => {
    world = createGameWorld({ pools: { projectiles: 2, particles: 0 } })
  })

  describe('resolution', () => {
    test('equal masses each move back half the penetration', () => {
      const a = actor(world, 0, 0)
      const b = actor(world, 28, 0)
      Velocity.x[a] = 100
      Velocity.x[b] = -100

      runCollision(world)

      expect(Transform.x[a]).toBe(-2)
      expect(Transform.x[b]).toBe(30)
      expect(Velocity.x[a]).toBe(0)
      expect(Velocity.x[b]).toBe(0)

      const contacts = liveContacts(world.contacts)
      expect(contacts).toHaveLength(1)
      expect(contacts[0]).toEqual({ a, b, normalX: 1, normalY: 0, depth: 4, relativeVelocity: -200 })
    })

    test('a static body takes none of the correction', () => {
      const floor = spawnStaticBody(world, -100, 100, 200, 16)
      const box = actor(world, 0, 70)
      Velocity.y[box] = 50

      runCollision(world)

      expect(Transform.y[box]).toBe(68)
      expect(Velocity.y[box]).toBe(0)
      expect(Transform.y[floor]).toBe(100)
      expect(Body.grounded[box]).toBe(1)
    })

    test('a body resting on the floor keeps its support contact', () => {
      spawnStaticBody(world, -100, 100, 200, 16)
      const box = actor(world, 0, 68)

      runCollision(world)
      runCollision(world)

      expect(Body.grounded[box]).toBe(1)
      expect(Transform.y[box]).toBe(68)
      expect(liveContacts(world.contacts)[0]?.depth).toBe(0)
    })

    test('the lower of two stacked dynamic bodies is not grounded by the upper one', () => {
      const lower = actor(world, 0, 40)
      const upper = actor(world, 0, 10)

      runCollision(world)

      expect(Body.grounded[upper]).toBe(1)
      expect(Body.grounded[lower]).toBe(0)
    })

    test('grounded resets once the support is gone', () => {
      spawnStaticBody(world, -100, 100, 200, 16)
      const box = actor(world, 0, 68)
      runCollision(world)
      expect(Body.grounded[box]).toBe(1)

      Transform.y[box] = 0
      runCollision(world)
      expect(Body.grounded[box]).toBe(0)
    })

    test('separating bodies keep their velocity', () => {
      const a = actor(world, 0, 0)
      const b = actor(world, 28, 0)
      Velocity.x[a] = -50
      Velocity.x[b] = 50

      runCollision(world)

      expect(Velocity.x[a]).toBe(-50)
      expect(Velocity.x[b]).toBe(50)
      expect(Transform.x[a]).toBe(-2)
    })
  })

  describe('filtering', () => {
    test('bodies whose layers and masks do not intersect pass through', () => {
      const a = spawnDynamicBody(world, 0, 0, { width: 32, height: 32, layer: CollisionLayer.ACTOR, mask: CollisionLayer.WORLD })
      const b = spawnDynamicBody(world, 16, 0, { width: 32, height: 32, layer: CollisionLayer.ACTOR, mask: CollisionLayer.WORLD })

      runCollision(world)

      expect(Transform.x[a]).toBe(0)
      expect(Transform.x[b]).toBe(16)
      expect(world.contacts.count).toBe(0)
    })

    test('no-self-collision pairs on one layer are skipped', () => {
      const options = { width: 32, height: 32, layer: CollisionLayer.ACTOR, mask: CollisionLayer.ACTOR, noSelfCollide: true }
      const a = spawnDynamicBody(world, 0, 0, options)
      spawnDynamicBody(world, 16, 0, options)

      runCollision(world)

      expect(Transform.x[a]).toBe(0)
      expect(world.contacts.count).toBe(0)
    })

    test('zero-area bodies are reported once per frame and ignored', () => {
      const flat = spawnDynamicBody(world, 0, 0, { width: 0, height: 32 })
      actor(world, 0, 0)

      runCollision(world)
      runCollision(world)

      expect(world.frame.diagnostics).toHaveLength(1)
      expect(world.frame.diagnostics[0]?.kind).toBe('invalid-aabb')
      expect(world.frame.diagnostics[0]?.eid).toBe(flat)
      expect(world.contacts.count).toBe(0)
    })

    test('a moving zero-area body is logged once, not once per position', () => {
      const warn = vi.spyOn(world.log, 'warn')
      const flat = spawnDynamicBody(world, 0, 0, { width: 0, height: 32 })

      for (let i = 0; i < 200; i++) {
        beginFrame(world)
        Transform.y[flat] = i * 5
        runCollision(world)
      }

      expect(warn).toHaveBeenCalledTimes(1)
      expect(world.loggedProblems.size).toBe(1)
      expect(world.loggedProblems.get(flat)).toEqual(new Set(['invalid-aabb']))

      despawnEntity(world, flat)
      expect(world.loggedProblems.size).toBe(0)
    })
  })

  describe('triggers', () => {
    let trigger: number
    let body: number

    beforeEach(() => {
      trigger = spawnTrigger(world, 0, 0, 64, 64, { enterCue: 'chime' })
      body = actor(world, 10, 10, 16)
    })

    test('reports enter, then stay, then exit', () => {
      runCollision(world)
      expect(world.frame.overlaps).toEqual([{ trigger, other: body, phase: 'enter' }])
      expect(world.frame.audio).toEqual([{ eid: trigger, cue: 'chime' }])

      beginFrame(world)
      runCollision(world)
      expect(world.frame.overlaps).toEqual([{ trigger, other: body, phase: 'stay' }])
      expect(world.frame.audio).toEqual([])

      beginFrame(world)
      Transform.x[body] = 300
      runCollision(world)
      expect(world.frame.overlaps).toEqual([{ trigger, other: body, phase: 'exit' }])
    })

    test('never pushes the overlapping body', () => {
      Velocity.x[body] = 40
      runCollision(world)
      expect(Transform.x[body]).toBe(10)
      expect(Velocity.x[body]).toBe(40)
      expect(world.contacts.count).toBe(0)
    })

    test('a despawned body exits', () => {
      runCollision(world)
      beginFrame(world)
      despawnEntity(world, body)
      runCollision(world)
      expect(world.frame.overlaps).toEqual([{ trigger, other: body, phase: 'exit' }])
    })

    test('the two pair sets are reused tick after tick', () => {
      const first = world.triggerPairs
      const second = world.nextTriggerPairs

      runCollision(world)
      expect(world.triggerPairs).toBe(second)
      expect(world.nextTriggerPairs).toBe(first)
      expect([...world.triggerPairs]).toHaveLength(1)

      beginFrame(world)
      runCollision(world)
      expect(world.triggerPairs).toBe(first)
      expect(world.frame.overlaps).toEqual([{ trigger, other: body, phase: 'stay' }])
    })

    test('events are ordered by trigger then other', () => {
      const second = actor(world, 20, 20, 16)
      runCollision(world)
      expect(world.frame.overlaps.map((e) => e.other)).toEqual([body, second])
    })
  })

  describe('projectiles', () => {
    test('a projectile hitting a wall returns to the pool and plays an impact', () => {
      const wall = spawnStaticBody(world, 100, 0, 16, 64)
      const projectile = spawnProjectile(world, {
        ownerId: NO_OWNER,
        x: 98,
        y: 10,
        vx: 0,
        vy: 0,
        lifetime: 1,
        layer: CollisionLayer.PROJECTILE,
        mask: CollisionLayer.WORLD,
      })

      runCollision(world)

      expect(world.projectilePool.activeCount).toBe(0)
      expect(world.projectilePool.isActive(projectile)).toBe(false)
      expect(entityExists(world, projectile)).toBe(true)
      expect(world.frame.audio).toEqual([{ eid: wall, cue: 'impact' }])
    })

    test('a projectile passes through its owner', () => {
      const owner = spawnStaticBody(world, 100, 0, 16, 64)
      spawnProjectile(world, {
        ownerId: owner,
        x: 98,
        y: 10,
        vx: 0,
        vy: 0,
        lifetime: 1,
        layer: CollisionLayer.PROJECTILE,
        mask: CollisionLayer.WORLD,
      })

      runCollision(world)

      expect(world.projectilePool.activeCount).toBe(1)
      expect(world.frame.audio).toEqual([])
    })
  })
})
