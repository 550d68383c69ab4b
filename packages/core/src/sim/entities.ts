/**
 * Entity store operations
 *
 * Entities are bitecs ids; all of their data lives in the component tables.
 * Despawns requested while a tick is running are deferred to the end of the
 * tick so no system sees an id vanish halfway through its pass.
 */

import { addEntity, removeEntity, entityExists, hasComponent, removeComponent } from 'bitecs'
import type { GameWorld } from './world'
import type { Aabb } from '../math/aabb'
import { setAabb } from '../math/aabb'
import { Body, ENGINE_COMPONENTS, MAX_ENTITIES, Pooled, Transform, resetComponentRow } from './components'
import { removeBody } from './SpatialHash'
import { ConfigurationError } from '../errors'
import { forgetLoggedProblems } from './diagnostics'

/**
 * Create a bare entity.
 * @throws ConfigurationError when the store is out of ids
 */
export function spawnEntity(world: GameWorld): number {
  const eid = addEntity(world)
  if (eid >= MAX_ENTITIES) {
    removeEntity(world, eid)
    throw new ConfigurationError('EntityStore', [`entity id ${eid} exceeds the component table size (${MAX_ENTITIES})`])
  }
  world.entities.add(eid)
  return eid
}

/**
 * Despawn an entity. Mid-tick the despawn is queued and applied once the
 * tick's systems finish. Pooled entities go back to their pool instead of
 * leaving the store.
 *
 * @returns false when the entity does not exist
 */
export function despawnEntity(world: GameWorld, eid: number): boolean {
  if (!entityExists(world, eid)) return false
  if (world.inTick) {
    world.pendingDespawns.add(eid)
    return true
  }
  destroyEntity(world, eid)
  return true
}

/** True when a despawn for `eid` is queued for the end of this tick */
export function isDespawnPending(world: GameWorld, eid: number): boolean {
  return world.pendingDespawns.has(eid)
}

/** Apply despawns queued during the tick */
export function flushDespawns(world: GameWorld): void {
  if (world.pendingDespawns.size === 0) return
  const queued = [...world.pendingDespawns]
  world.pendingDespawns.clear()
  for (const eid of queued) {
    if (entityExists(world, eid)) destroyEntity(world, eid)
  }
}

function destroyEntity(world: GameWorld, eid: number): void {
  world.sceneEntities.delete(eid)

  if (hasComponent(world, Pooled, eid)) {
    const pool = world.pools[Pooled.pool[eid]!]
    if (pool && pool.owns(eid)) {
      // An inactive pooled entity is already in its default state
      if (pool.isActive(eid)) pool.release(eid)
      return
    }
  }

  clearEntityState(world, eid)
  resetEntityComponents(world, eid, false)
  removeEntity(world, eid)
  world.entities.delete(eid)
}

/** Drop everything the world keeps about an entity outside the component tables */
export function clearEntityState(world: GameWorld, eid: number): void {
  removeBody(world.spatialHash, eid)
  world.assetRefs.delete(eid)
  world.enterCues.delete(eid)
  forgetLoggedProblems(world, eid)
  world.pendingDespawns.delete(eid)
}

/**
 * Detach every engine component and reset its table row to defaults.
 *
 * @param keepPooled - leave the Pooled bookkeeping attached (pool release)
 */
export function resetEntityComponents(world: GameWorld, eid: number, keepPooled: boolean): void {
  for (const component of ENGINE_COMPONENTS) {
    if (keepPooled && component === Pooled) continue
    if (hasComponent(world, component, eid)) removeComponent(world, component, eid)
    resetComponentRow(component, eid)
  }
}

/** World-space box of an entity's Body */
export function entityAabb(eid: number, out: Aabb): Aabb {
  const minX = Transform.x[eid]! + Body.offsetX[eid]!
  const minY = Transform.y[eid]! + Body.offsetY[eid]!
  return setAabb(out, minX, minY, minX + Body.width[eid]!, minY + Body.height[eid]!)
}
