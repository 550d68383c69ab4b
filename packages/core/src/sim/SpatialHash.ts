/**
 * Spatial Hash Grid
 *
 * Uniform grid broad phase keyed by (floor(x / cellSize), floor(y / cellSize)).
 * A body is listed in every cell its AABB overlaps. The grid is unbounded in
 * practice: cell coordinates are clamped to ±CELL_LIMIT, which keeps queries
 * conservative (a clamped body still lands in the clamped cells a query visits).
 *
 * Cell buckets are recycled across rebuilds, so steady-state rebuilds do not
 * allocate once every occupied cell has been seen.
 */

import type { Aabb } from '../math/aabb'
import { MAX_ENTITIES } from './components'

/** Cell coordinates are clamped to [-CELL_LIMIT, CELL_LIMIT - 1] */
const CELL_LIMIT = 32768
const CELL_SPAN = CELL_LIMIT * 2

export interface SpatialHash {
  cellSize: number
  invCellSize: number
  /** Cell key → ids of bodies overlapping that cell */
  cells: Map<number, number[]>
  /** Body id → keys of the cells it occupies */
  bodyCells: Map<number, number[]>
  /** Emptied buckets waiting for reuse */
  spare: number[][]
  /** Per-entity marker so one query reports each body once */
  stamps: Uint32Array
  stamp: number
}

/**
 * Create an empty grid
 *
 * @param cellSize - Cell edge in world units; pick it so most bodies span 1-4 cells
 */
export function createSpatialHash(cellSize: number): SpatialHash {
  return {
    cellSize,
    invCellSize: 1 / cellSize,
    cells: new Map(),
    bodyCells: new Map(),
    spare: [],
    stamps: new Uint32Array(MAX_ENTITIES),
    stamp: 0,
  }
}

function toCell(hash: SpatialHash, coord: number): number {
  const c = Math.floor(coord * hash.invCellSize)
  if (c < -CELL_LIMIT) return -CELL_LIMIT
  if (c >= CELL_LIMIT) return CELL_LIMIT - 1
  return c
}

/** Pack clamped cell coordinates into one integer key */
export function cellKey(cx: number, cy: number): number {
  return (cx + CELL_LIMIT) * CELL_SPAN + (cy + CELL_LIMIT)
}

function takeBucket(hash: SpatialHash): number[] {
  return hash.spare.pop() ?? []
}

function giveBucket(hash: SpatialHash, bucket: number[]): void {
  bucket.length = 0
  hash.spare.push(bucket)
}

/** Number of bodies currently indexed */
export function spatialHashSize(hash: SpatialHash): number {
  return hash.bodyCells.size
}

/** Drop every body, keeping buckets for reuse */
export function clearSpatialHash(hash: SpatialHash): void {
  for (const bucket of hash.cells.values()) giveBucket(hash, bucket)
  for (const keys of hash.bodyCells.values()) giveBucket(hash, keys)
  hash.cells.clear()
  hash.bodyCells.clear()
}

/** Index a body under every cell its box overlaps. Re-inserting moves it. */
export function insertBody(hash: SpatialHash, eid: number, box: Aabb): void {
  if (hash.bodyCells.has(eid)) removeBody(hash, eid)

  const minCX = toCell(hash, box.minX)
  const maxCX = toCell(hash, box.maxX)
  const minCY = toCell(hash, box.minY)
  const maxCY = toCell(hash, box.maxY)

  const keys = takeBucket(hash)
  for (let cy = minCY; cy <= maxCY; cy++) {
    for (let cx = minCX; cx <= maxCX; cx++) {
      const key = cellKey(cx, cy)
      let bucket = hash.cells.get(key)
      if (!bucket) {
        bucket = takeBucket(hash)
        hash.cells.set(key, bucket)
      }
      bucket.push(eid)
      keys.push(key)
    }
  }
  hash.bodyCells.set(eid, keys)
}

/** Remove a body from every cell it occupies. Unknown ids are ignored. */
export function removeBody(hash: SpatialHash, eid: number): void {
  const keys = hash.bodyCells.get(eid)
  if (!keys) return

  for (const key of keys) {
    const bucket = hash.cells.get(key)
    if (!bucket) continue
    const idx = bucket.indexOf(eid)
    if (idx >= 0) {
      // Swap-remove, order inside a cell carries no meaning
      bucket[idx] = bucket[bucket.length - 1]!
      bucket.length--
    }
    if (bucket.length === 0) {
      hash.cells.delete(key)
      giveBucket(hash, bucket)
    }
  }
  hash.bodyCells.delete(eid)
  giveBucket(hash, keys)
}

/** Cells a body is currently listed under (empty when not indexed) */
export function getBodyCells(hash: SpatialHash, eid: number): readonly number[] {
  return hash.bodyCells.get(eid) ?? []
}

/**
 * Rebuild from scratch: clear, then insert every id whose bounds `boundsOf`
 * reports. `boundsOf` returns false to leave a body out.
 */
export function rebuildSpatialHash(
  hash: SpatialHash,
  eids: readonly number[],
  boundsOf: (eid: number, out: Aabb) => boolean,
  scratch: Aabb
): void {
  clearSpatialHash(hash)
  for (let i = 0; i < eids.length; i++) {
    const eid = eids[i]!
    if (boundsOf(eid, scratch)) insertBody(hash, eid, scratch)
  }
}

/**
 * Visit every body listed in a cell the box overlaps, each at most once.
 * May include bodies that do not actually overlap; the narrow phase decides.
 */
export function forEachInAabb(hash: SpatialHash, box: Aabb, callback: (eid: number) => void): void {
  const minCX = toCell(hash, box.minX)
  const maxCX = toCell(hash, box.maxX)
  const minCY = toCell(hash, box.minY)
  const maxCY = toCell(hash, box.maxY)

  hash.stamp = (hash.stamp + 1) >>> 0
  if (hash.stamp === 0) {
    hash.stamps.fill(0)
    hash.stamp = 1
  }
  const stamp = hash.stamp
  const stamps = hash.stamps

  for (let cy = minCY; cy <= maxCY; cy++) {
    for (let cx = minCX; cx <= maxCX; cx++) {
      const bucket = hash.cells.get(cellKey(cx, cy))
      if (!bucket) continue
      for (let i = 0; i < bucket.length; i++) {
        const eid = bucket[i]!
        if (stamps[eid] === stamp) continue
        stamps[eid] = stamp
        callback(eid)
      }
    }
  }
}

/** Iterator form of forEachInAabb */
export function queryAabb(hash: SpatialHash, box: Aabb): IterableIterator<number> {
  const found: number[] = []
  forEachInAabb(hash, box, (eid) => found.push(eid))
  return found[Symbol.iterator]()
}
