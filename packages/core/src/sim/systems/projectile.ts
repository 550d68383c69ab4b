/**
 * Projectile System
 *
 * Counts down projectile lifetimes and sends expired ones back to the pool.
 * Hits are handled by the collision pass.
 */

import { defineQuery } from 'bitecs'
import type { GameWorld } from '../world'
import { Projectile } from '../components'
import { despawnEntity } from '../entities'

const projectileQuery = defineQuery([Projectile])

export function projectileSystem(world: GameWorld, dt: number): void {
  for (const eid of projectileQuery(world)) {
    if (world.pendingDespawns.has(eid)) continue

    // Note: Non-null assertion safe because entities come from query with Projectile component
    const lifetime = Projectile.lifetime[eid]! - dt
    Projectile.lifetime[eid] = lifetime
    if (lifetime <= 0) despawnEntity(world, eid)
  }
}
