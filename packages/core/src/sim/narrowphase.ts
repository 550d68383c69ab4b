/**
 * Narrow phase
 *
 * Exact AABB tests on broad-phase candidates. Normals follow the axis of
 * least penetration; on a tie the vertical axis wins so a body landing on a
 * corner is treated as standing rather than pushed sideways.
 */

import type { Aabb } from '../math/aabb'
import { Body } from './components'

/** Normal and depth of a box contact, normal pointing from A to B */
export interface ContactGeometry {
  normalX: number
  normalY: number
  depth: number
}

/**
 * Bidirectional layer filter: either body may opt into the pair.
 */
export function shouldCollide(a: number, b: number): boolean {
  return (Body.layer[a]! & Body.mask[b]!) !== 0 || (Body.layer[b]! & Body.mask[a]!) !== 0
}

/** Pairs on the same layer where both bodies opted out of self-collision */
export function isSelfCollisionExcluded(a: number, b: number): boolean {
  return Body.noSelfCollide[a] === 1 && Body.noSelfCollide[b] === 1 && Body.layer[a] === Body.layer[b]
}

/**
 * Compute the contact between two boxes.
 *
 * Boxes within `skin` of each other count as touching (depth 0) so a body at
 * rest on a floor keeps reporting its support contact. Boxes that only meet
 * at a corner do not touch.
 *
 * @returns false when the boxes are apart
 */
export function computeContact(a: Aabb, b: Aabb, skin: number, out: ContactGeometry): boolean {
  const overlapX = Math.min(a.maxX, b.maxX) - Math.max(a.minX, b.minX)
  const overlapY = Math.min(a.maxY, b.maxY) - Math.max(a.minY, b.minY)

  if (overlapX <= -skin || overlapY <= -skin) return false
  if (overlapX <= 0 && overlapY <= 0) return false

  if (overlapX < overlapY) {
    out.normalX = a.minX + a.maxX <= b.minX + b.maxX ? 1 : -1
    out.normalY = 0
    out.depth = Math.max(0, overlapX)
  } else {
    out.normalX = 0
    out.normalY = a.minY + a.maxY <= b.minY + b.maxY ? 1 : -1
    out.depth = Math.max(0, overlapY)
  }
  return true
}
