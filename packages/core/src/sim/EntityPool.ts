/**
 * EntityPool - fixed-capacity set of pre-allocated entities.
 *
 * Every slot's entity is created up front and lives in the store for the
 * pool's whole life; acquiring only flips it active. The free list is LIFO so
 * the most recently released slot is handed out first.
 * Exhaustion returns POOL_EXHAUSTED; callers drop the spawn.
 */

import { addComponent, entityExists, removeEntity } from 'bitecs'
import type { GameWorld } from './world'
import { Pooled } from './components'
import { ConfigurationError } from '../errors'
import { invariant } from './diagnostics'
import { clearEntityState, resetEntityComponents, spawnEntity } from './entities'

/** Returned by acquire() when every slot is active. Never a valid entity id. */
export const POOL_EXHAUSTED = -1

/** Pool ids are stored in a Uint8Array column */
const MAX_POOLS = 256

export class EntityPool {
  readonly id: number
  readonly name: string
  readonly capacity: number

  /** slot → entity id */
  private readonly slots: Int32Array
  /** slot → index in activeList, -1 when free */
  private readonly activeIndex: Int32Array
  private readonly freeList: number[]
  private readonly activeList: number[]
  private world: GameWorld | null = null

  constructor(id: number, name: string, capacity: number) {
    const problems: string[] = []
    if (!Number.isInteger(id) || id < 0 || id >= MAX_POOLS) problems.push(`id must be an integer in [0, ${MAX_POOLS}) (got ${id})`)
    if (!Number.isInteger(capacity) || capacity < 0) problems.push(`capacity must be a non-negative integer (got ${capacity})`)
    if (problems.length > 0) throw new ConfigurationError(`EntityPool '${name}'`, problems)

    this.id = id
    this.name = name
    this.capacity = capacity
    this.slots = new Int32Array(capacity).fill(-1)
    this.activeIndex = new Int32Array(capacity).fill(-1)
    this.freeList = []
    this.activeList = []
  }

  /**
   * Allocate this pool's entities in `world`. Until this runs the pool has no
   * free slots and every acquire fails.
   */
  populate(world: GameWorld): void {
    if (this.world) return
    this.world = world

    for (let slot = 0; slot < this.capacity; slot++) {
      const eid = spawnEntity(world)
      addComponent(world, Pooled, eid)
      Pooled.pool[eid] = this.id
      Pooled.slot[eid] = slot
      Pooled.active[eid] = 0
      this.slots[slot] = eid
    }
    // Reverse so slot 0 is popped first
    for (let slot = this.capacity - 1; slot >= 0; slot--) {
      this.freeList.push(slot)
    }
  }

  get activeCount(): number {
    return this.activeList.length
  }

  get freeCount(): number {
    return this.freeList.length
  }

  /**
   * Take a free entity.
   * @returns the entity id, or POOL_EXHAUSTED when no slot is free
   */
  acquire(): number {
    const world = this.world
    if (!world || this.freeList.length === 0) return POOL_EXHAUSTED

    const slot = this.freeList.pop()!
    const eid = this.slots[slot]!
    if (!invariant(world, entityExists(world, eid), `pool '${this.name}' slot ${slot} points at missing entity ${eid}`)) {
      // The slot is unusable; leave it out of both lists
      return POOL_EXHAUSTED
    }

    Pooled.active[eid] = 1
    this.activeIndex[slot] = this.activeList.length
    this.activeList.push(slot)
    return eid
  }

  /**
   * Reset every component of an active entity to defaults and return its slot
   * to the free list.
   * @returns false when the entity is not an active member of this pool
   */
  release(eid: number): boolean {
    const world = this.world
    if (!world) return false
    if (!invariant(world, this.isActive(eid), `pool '${this.name}' released entity ${eid} that it has not handed out`)) {
      return false
    }

    const slot = Pooled.slot[eid]!
    clearEntityState(world, eid)
    resetEntityComponents(world, eid, true)
    Pooled.active[eid] = 0

    // Swap-remove from the active list
    const idx = this.activeIndex[slot]!
    const last = this.activeList.length - 1
    const moved = this.activeList[last]!
    this.activeList[idx] = moved
    this.activeIndex[moved] = idx
    this.activeList.length = last
    this.activeIndex[slot] = -1

    this.freeList.push(slot)
    return true
  }

  /** True when `eid` is one of this pool's entities, active or not */
  owns(eid: number): boolean {
    if (eid < 0 || Pooled.pool[eid] !== this.id) return false
    const slot = Pooled.slot[eid]!
    return slot < this.capacity && this.slots[slot] === eid
  }

  isActive(eid: number): boolean {
    return this.owns(eid) && Pooled.active[eid] === 1
  }

  /** Visit active entities. The callback may release the entity it is given. */
  forEachActive(callback: (eid: number) => void): void {
    for (let i = this.activeList.length - 1; i >= 0; i--) {
      const slot = this.activeList[i]
      if (slot === undefined) continue
      callback(this.slots[slot]!)
    }
  }

  /** Release every active entity */
  releaseAll(): void {
    while (this.activeList.length > 0) {
      const slot = this.activeList[this.activeList.length - 1]!
      if (!this.release(this.slots[slot]!)) {
        // Unreachable unless bookkeeping is corrupt; drop the slot so the loop ends
        this.activeList.length--
      }
    }
  }

  /** Release everything and remove the pool's entities from the store */
  dispose(): void {
    const world = this.world
    if (!world) return
    this.releaseAll()
    for (let slot = 0; slot < this.capacity; slot++) {
      const eid = this.slots[slot]!
      if (eid < 0) continue
      resetEntityComponents(world, eid, false)
      if (entityExists(world, eid)) removeEntity(world, eid)
      world.entities.delete(eid)
      this.slots[slot] = -1
    }
    this.freeList.length = 0
    this.world = null
  }
}
