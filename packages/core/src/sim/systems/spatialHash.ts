/**
 * Spatial Hash System
 *
 * Rebuilds the broad phase each tick from every entity with Transform + Body,
 * after integration has moved them and before the collision pass queries.
 * Bodies with a zero-area or non-finite box are left out and reported.
 */

import { defineQuery } from 'bitecs'
import type { GameWorld } from '../world'
import type { Aabb } from '../../math/aabb'
import { isValidAabb } from '../../math/aabb'
import { Transform, Body } from '../components'
import { rebuildSpatialHash } from '../SpatialHash'
import { entityAabb } from '../entities'
import { reportProblem } from '../diagnostics'

const hashQuery = defineQuery([Transform, Body])

export function spatialHashSystem(world: GameWorld, _dt: number): void {
  const boundsOf = (eid: number, out: Aabb): boolean => {
    if (world.pendingDespawns.has(eid)) return false
    entityAabb(eid, out)
    if (isValidAabb(out)) return true
    reportProblem(
      world,
      'invalid-aabb',
      eid,
      `body box ${Body.width[eid]}x${Body.height[eid]} at (${out.minX}, ${out.minY}) is empty or non-finite; skipped`
    )
    return false
  }

  rebuildSpatialHash(world.spatialHash, hashQuery(world), boundsOf, world.scratchAabb)
}
