/**
 * Particle System
 *
 * Moves pooled particles in a straight line, shrinks them over their life and
 * returns them to the pool when it runs out. Particles have no body.
 */

import { defineQuery } from 'bitecs'
import type { GameWorld } from '../world'
import { Particle, Transform, Velocity } from '../components'
import { despawnEntity } from '../entities'

const particleQuery = defineQuery([Particle, Transform, Velocity])

export function particleSystem(world: GameWorld, dt: number): void {
  for (const eid of particleQuery(world)) {
    if (world.pendingDespawns.has(eid)) continue

    const remaining = Particle.lifetime[eid]! - dt
    Particle.lifetime[eid] = remaining
    if (remaining <= 0) {
      despawnEntity(world, eid)
      continue
    }

    Transform.prevX[eid] = Transform.x[eid]!
    Transform.prevY[eid] = Transform.y[eid]!
    Transform.x[eid] = Transform.x[eid]! + Velocity.x[eid]! * dt
    Transform.y[eid] = Transform.y[eid]! + Velocity.y[eid]! * dt

    const maxLifetime = Particle.maxLifetime[eid]!
    const scale = maxLifetime > 0 ? remaining / maxLifetime : 0
    Transform.scaleX[eid] = scale
    Transform.scaleY[eid] = scale
  }
}
