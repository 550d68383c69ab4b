/**
 * Collision System
 *
 * Narrow phase and resolution over broad-phase candidates.
 *
 * - Every dynamic or trigger body queries the grid with its box grown by the
 *   contact skin; each pair is visited once.
 * - Solid pairs push apart along the axis of least penetration, split by
 *   inverse mass, then cancel the approaching part of their velocity.
 * - Trigger pairs only produce overlap events (enter / stay / exit).
 * - Projectiles hitting a solid body other than their owner are despawned.
 *
 * Grounded flags are recomputed here from scratch, so a body is grounded for
 * the next tick only if this pass found something beneath it.
 */

import { defineQuery, entityExists, hasComponent } from 'bitecs'
import type { GameWorld } from '../world'
import { nextContact } from '../events'
import { createAabb, expandAabb, aabbOverlaps } from '../../math/aabb'
import { Transform, Velocity, Body, BodyKind, Projectile, MAX_ENTITIES } from '../components'
import { forEachInAabb, getBodyCells } from '../SpatialHash'
import { computeContact, isSelfCollisionExcluded, shouldCollide, type ContactGeometry } from '../narrowphase'
import { despawnEntity, entityAabb } from '../entities'

const bodyQuery = defineQuery([Transform, Body])

// Scratch storage. The pass never re-enters itself, so sharing it across
// worlds is safe.
const boxA = createAabb()
const boxB = createAabb()
const queryBox = createAabb()
const geometry: ContactGeometry = { normalX: 0, normalY: 0, depth: 0 }
const candidates: number[] = []
const pairKeys: number[] = []

function isMover(eid: number): boolean {
  const kind = Body.kind[eid]
  return kind === BodyKind.DYNAMIC || kind === BodyKind.TRIGGER
}

// Ascending keys are ordered by (trigger, other)
function pairKey(trigger: number, other: number): number {
  return trigger * MAX_ENTITIES + other
}

/**
 * Collision system - contacts, resolution, trigger overlaps
 *
 * @param world - The game world
 * @param _dt - Delta time in seconds
 */
export function collisionSystem(world: GameWorld, _dt: number): void {
  const bodies = bodyQuery(world)
  const currentPairs = world.nextTriggerPairs
  currentPairs.clear()

  for (const eid of bodies) {
    Body.grounded[eid] = 0
  }

  for (const a of bodies) {
    if (!isMover(a) || world.pendingDespawns.has(a)) continue
    // Left out of the grid: invalid box, already reported
    if (getBodyCells(world.spatialHash, a).length === 0) continue

    entityAabb(a, boxA)
    expandAabb(queryBox, boxA, world.config.contactSkin)
    candidates.length = 0
    forEachInAabb(world.spatialHash, queryBox, (b) => {
      candidates.push(b)
    })

    for (const b of candidates) {
      if (b === a) continue
      // The pair is handled from the smaller mover's side
      if (isMover(b) && b < a) continue
      if (world.pendingDespawns.has(a)) break
      if (world.pendingDespawns.has(b)) continue
      if (isSelfCollisionExcluded(a, b) || !shouldCollide(a, b)) continue

      // Earlier pairs may have moved A
      entityAabb(a, boxA)
      entityAabb(b, boxB)

      const kindA = Body.kind[a]
      const kindB = Body.kind[b]
      if (kindA === BodyKind.TRIGGER || kindB === BodyKind.TRIGGER) {
        if (kindA === kindB) continue
        if (!aabbOverlaps(boxA, boxB)) continue
        const trigger = kindA === BodyKind.TRIGGER ? a : b
        const other = trigger === a ? b : a
        currentPairs.add(pairKey(trigger, other))
        continue
      }

      const projectileA = hasComponent(world, Projectile, a)
      const projectileB = hasComponent(world, Projectile, b)
      if (projectileA || projectileB) {
        if (projectileA && projectileB) continue
        const projectile = projectileA ? a : b
        const target = projectile === a ? b : a
        if (Projectile.ownerId[projectile] === target) continue
        if (!aabbOverlaps(boxA, boxB)) continue
        despawnEntity(world, projectile)
        // The projectile is gone by publish time, so the cue plays on the target
        world.frame.audio.push({ eid: target, cue: 'impact' })
        if (projectile === a) break
        continue
      }

      if (!computeContact(boxA, boxB, world.config.contactSkin, geometry)) continue
      resolveContact(world, a, b)
    }
  }

  emitTriggerEvents(world, currentPairs)
}

/** Record the contact for A/B and push the bodies apart */
function resolveContact(world: GameWorld, a: number, b: number): void {
  const nx = geometry.normalX
  const ny = geometry.normalY
  const depth = geometry.depth
  const dynamicA = Body.kind[a] === BodyKind.DYNAMIC
  const dynamicB = Body.kind[b] === BodyKind.DYNAMIC
  const invA = dynamicA ? Body.invMass[a]! : 0
  const invB = dynamicB ? Body.invMass[b]! : 0

  const relativeVelocity = (Velocity.x[b]! - Velocity.x[a]!) * nx + (Velocity.y[b]! - Velocity.y[a]!) * ny

  const contact = nextContact(world.contacts)
  contact.a = a
  contact.b = b
  contact.normalX = nx
  contact.normalY = ny
  contact.depth = depth
  contact.relativeVelocity = relativeVelocity

  // Normal points from A to B, so A resting on top of B has ny > 0 (y is down)
  if (ny > 0 && dynamicA) Body.grounded[a] = 1
  if (ny < 0 && dynamicB) Body.grounded[b] = 1

  const totalInv = invA + invB
  if (totalInv <= 0) return

  if (depth > 0) {
    const shareA = (depth * invA) / totalInv
    const shareB = (depth * invB) / totalInv
    Transform.x[a] = Transform.x[a]! - nx * shareA
    Transform.y[a] = Transform.y[a]! - ny * shareA
    Transform.x[b] = Transform.x[b]! + nx * shareB
    Transform.y[b] = Transform.y[b]! + ny * shareB
  }

  // Only cancel velocity when approaching
  if (relativeVelocity < 0) {
    const impulse = (-(1 + world.config.restitution) * relativeVelocity) / totalInv
    Velocity.x[a] = Velocity.x[a]! - nx * impulse * invA
    Velocity.y[a] = Velocity.y[a]! - ny * impulse * invA
    Velocity.x[b] = Velocity.x[b]! + nx * impulse * invB
    Velocity.y[b] = Velocity.y[b]! + ny * impulse * invB
  }
}

/**
 * Diff this tick's trigger pairs against last tick's and append enter / stay /
 * exit events ordered by (trigger, other). The two pair sets then swap roles.
 */
function emitTriggerEvents(world: GameWorld, currentPairs: Set<number>): void {
  const previousPairs = world.triggerPairs

  pairKeys.length = 0
  for (const key of currentPairs) pairKeys.push(key)
  for (const key of previousPairs) {
    if (!currentPairs.has(key)) pairKeys.push(key)
  }
  pairKeys.sort((x, y) => x - y)

  for (const key of pairKeys) {
    const trigger = Math.floor(key / MAX_ENTITIES)
    const other = key - trigger * MAX_ENTITIES
    const phase = !currentPairs.has(key) ? 'exit' : previousPairs.has(key) ? 'stay' : 'enter'
    world.frame.overlaps.push({ trigger, other, phase })
    if (phase !== 'enter') continue
    const cue = world.enterCues.get(trigger)
    if (cue !== undefined && entityExists(world, trigger)) {
      world.frame.audio.push({ eid: trigger, cue })
    }
  }

  world.triggerPairs = currentPairs
  world.nextTriggerPairs = previousPairs
}
