/**
 * Axis-aligned bounding boxes.
 *
 * Boxes are mutable so hot paths can reuse scratch instances instead of
 * allocating one per query.
 */

export interface Aabb {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

export function createAabb(minX = 0, minY = 0, maxX = 0, maxY = 0): Aabb {
  return { minX, minY, maxX, maxY }
}

/** Build a box from a top-left corner and size */
export function aabbFromRect(x: number, y: number, width: number, height: number): Aabb {
  return { minX: x, minY: y, maxX: x + width, maxY: y + height }
}

export function setAabb(out: Aabb, minX: number, minY: number, maxX: number, maxY: number): Aabb {
  out.minX = minX
  out.minY = minY
  out.maxX = maxX
  out.maxY = maxY
  return out
}

/** Grow `box` by `margin` on every side, writing into `out` */
export function expandAabb(out: Aabb, box: Aabb, margin: number): Aabb {
  return setAabb(out, box.minX - margin, box.minY - margin, box.maxX + margin, box.maxY + margin)
}

/**
 * True when the box has positive, finite extent on both axes.
 * Zero-area and non-finite boxes cannot produce a meaningful contact.
 */
export function isValidAabb(box: Aabb): boolean {
  return (
    Number.isFinite(box.minX) &&
    Number.isFinite(box.minY) &&
    Number.isFinite(box.maxX) &&
    Number.isFinite(box.maxY) &&
    box.maxX > box.minX &&
    box.maxY > box.minY
  )
}

/** Strict interior overlap (touching edges do not count) */
export function aabbOverlaps(a: Aabb, b: Aabb): boolean {
  return a.minX < b.maxX && b.minX < a.maxX && a.minY < b.maxY && b.minY < a.maxY
}
