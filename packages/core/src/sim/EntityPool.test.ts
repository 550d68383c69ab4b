import { beforeEach, describe, expect, test } from 'vitest'
import { addComponent, entityExists, hasComponent } from 'bitecs'
import { createGameWorld, createPool, type GameWorld } from './world'
import { EntityPool, POOL_EXHAUSTED } from './EntityPool'
import { Body, BodyKind, Pooled, Transform, Velocity } from './components'
import { addBody, addTransform } from './prefabs'
import { despawnEntity, flushDespawns, isDespawnPending, spawnEntity } from './entities'
import { ConfigurationError, InvariantViolationError } from '../errors'

function acquireAll(pool: EntityPool): number[] {
  const ids: number[] = []
  for (;;) {
    const eid = pool.acquire()
    if (eid === POOL_EXHAUSTED) return ids
    ids.push(eid)
  }
}

describe('EntityPool', () => {
  let world: GameWorld
  let pool: EntityPool

  beforeEach(() => {
    world = createGameWorld({ pools: { projectiles: 0, particles: 0 } })
    pool = createPool(world, 'sparks', 3)
  })

  describe('acquire', () => {
    test('hands out every slot once, then reports exhaustion', () => {
      const ids = acquireAll(pool)
      expect(ids).toHaveLength(3)
      expect(new Set(ids).size).toBe(3)
      expect(pool.acquire()).toBe(POOL_EXHAUSTED)
      expect(pool.activeCount).toBe(3)
      expect(pool.freeCount).toBe(0)
    })

    test('pooled entities exist before they are acquired', () => {
      const eid = pool.acquire()
      expect(entityExists(world, eid)).toBe(true)
      expect(hasComponent(world, Pooled, eid)).toBe(true)
      expect(Pooled.active[eid]).toBe(1)
      expect(world.entities.has(eid)).toBe(true)
    })

    test('an unpopulated pool has nothing to give', () => {
      const detached = new EntityPool(5, 'detached', 4)
      expect(detached.acquire()).toBe(POOL_EXHAUSTED)
      expect(detached.release(0)).toBe(false)
    })

    test('an empty pool is valid and always exhausted', () => {
      const empty = createPool(world, 'empty', 0)
      expect(empty.acquire()).toBe(POOL_EXHAUSTED)
    })
  })

  describe('release', () => {
    test('n releases allow exactly n more acquires', () => {
      const ids = acquireAll(pool)
      expect(pool.release(ids[0]!)).toBe(true)
      expect(pool.release(ids[2]!)).toBe(true)

      const again = acquireAll(pool)
      expect(again.sort((a, b) => a - b)).toEqual([ids[0]!, ids[2]!].sort((a, b) => a - b))
    })

    test('the most recently released slot is reused first', () => {
      const [first, second] = acquireAll(pool)
      pool.release(first!)
      pool.release(second!)
      expect(pool.acquire()).toBe(second)
    })

    test('released entities come back with default component values', () => {
      const eid = pool.acquire()
      addTransform(world, eid, 40, 50)
      Transform.scaleX[eid] = 3
      addBody(world, eid, { kind: BodyKind.DYNAMIC, width: 8, height: 8, gravityScale: 0 })
      Velocity.x[eid] = 99

      pool.release(eid)
      expect(pool.acquire()).toBe(eid)

      expect(hasComponent(world, Transform, eid)).toBe(false)
      expect(hasComponent(world, Body, eid)).toBe(false)
      expect(hasComponent(world, Velocity, eid)).toBe(false)
      expect(hasComponent(world, Pooled, eid)).toBe(true)
      expect(Transform.x[eid]).toBe(0)
      expect(Transform.scaleX[eid]).toBe(1)
      expect(Body.gravityScale[eid]).toBe(1)
      expect(Body.width[eid]).toBe(0)
      expect(Velocity.x[eid]).toBe(0)
    })

    test('double release is rejected and logged outside debug mode', () => {
      const eid = pool.acquire()
      expect(pool.release(eid)).toBe(true)
      expect(pool.release(eid)).toBe(false)
      expect(pool.freeCount).toBe(3)
    })

    test('double release throws in debug mode', () => {
      const debugWorld = createGameWorld({ config: { debug: true }, pools: { projectiles: 0, particles: 0 } })
      const debugPool = createPool(debugWorld, 'sparks', 1)
      const eid = debugPool.acquire()
      debugPool.release(eid)
      expect(() => debugPool.release(eid)).toThrow(InvariantViolationError)
    })

    test('entities from elsewhere are not accepted', () => {
      const other = createPool(world, 'other', 1)
      const foreign = other.acquire()
      const plain = spawnEntity(world)

      expect(pool.owns(foreign)).toBe(false)
      expect(pool.release(foreign)).toBe(false)
      expect(pool.release(plain)).toBe(false)
      expect(other.isActive(foreign)).toBe(true)
    })

    test('the callback of forEachActive may release what it visits', () => {
      acquireAll(pool)
      const seen: number[] = []
      pool.forEachActive((eid) => {
        seen.push(eid)
        pool.release(eid)
      })
      expect(seen).toHaveLength(3)
      expect(pool.activeCount).toBe(0)
    })
  })

  describe('despawning pooled entities', () => {
    test('despawn returns the entity to its pool instead of destroying it', () => {
      const eid = pool.acquire()
      expect(despawnEntity(world, eid)).toBe(true)
      expect(entityExists(world, eid)).toBe(true)
      expect(pool.isActive(eid)).toBe(false)
      expect(pool.freeCount).toBe(3)
    })

    test('despawns during a tick wait for the flush', () => {
      const eid = pool.acquire()
      world.inTick = true
      despawnEntity(world, eid)
      expect(isDespawnPending(world, eid)).toBe(true)
      expect(pool.isActive(eid)).toBe(true)

      world.inTick = false
      flushDespawns(world)
      expect(isDespawnPending(world, eid)).toBe(false)
      expect(pool.isActive(eid)).toBe(false)
    })

    test('a plain entity leaves the store', () => {
      const eid = spawnEntity(world)
      addComponent(world, Transform, eid)
      despawnEntity(world, eid)
      expect(entityExists(world, eid)).toBe(false)
      expect(world.entities.has(eid)).toBe(false)
      expect(despawnEntity(world, eid)).toBe(false)
    })
  })

  test('rejects invalid capacities', () => {
    expect(() => new EntityPool(0, 'bad', -1)).toThrow(ConfigurationError)
    expect(() => new EntityPool(0, 'bad', 1.5)).toThrow(ConfigurationError)
    expect(() => new EntityPool(300, 'bad', 1)).toThrow(ConfigurationError)
  })

  test('dispose removes every pooled entity from the store', () => {
    const ids = acquireAll(pool)
    pool.dispose()
    for (const eid of ids) {
      expect(entityExists(world, eid)).toBe(false)
      expect(world.entities.has(eid)).toBe(false)
    }
    expect(pool.activeCount).toBe(0)
    expect(pool.acquire()).toBe(POOL_EXHAUSTED)
  })
})
