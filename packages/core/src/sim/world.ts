/**
 * ECS World Management
 *
 * The world is the single simulation context: entity store, pools, broad
 * phase and per-frame outputs. It is created explicitly and passed to every
 * system; nothing here is process-global.
 */

import { createWorld as bitCreateWorld, type IWorld } from 'bitecs'
import type { InputState } from '../io/input'
import { createInputState } from '../io/input'
import { SeededRng } from '../math/rng'
import { createAabb, type Aabb } from '../math/aabb'
import { createLogger, type Logger } from '../logger'
import { resolveEngineConfig, type EngineConfig } from './config'
import { createSpatialHash, type SpatialHash } from './SpatialHash'
import {
  createContactBuffer,
  createFrameEvents,
  type ContactBuffer,
  type DiagnosticKind,
  type FrameEvents,
} from './events'
import { EntityPool } from './EntityPool'
import { PROJECTILE_POOL_SIZE, PARTICLE_POOL_SIZE } from './content/pools'

export interface PoolSizes {
  projectiles: number
  particles: number
}

export interface GameWorldOptions {
  config?: Partial<EngineConfig>
  pools?: Partial<PoolSizes>
  log?: Logger
}

/**
 * Game world containing all ECS state
 */
export interface GameWorld extends IWorld {
  /** Current simulation tick number */
  tick: number
  /** Simulated seconds so far */
  time: number
  /** Fixed tick length in seconds */
  dt: number
  config: EngineConfig
  log: Logger
  /** Seeded PRNG for deterministic simulation randomness */
  rng: SeededRng
  /** Broad phase, rebuilt every tick before the collision pass queries it */
  spatialHash: SpatialHash
  /** Every live entity created through spawnEntity, pooled ones included */
  entities: Set<number>
  /** True while stepWorld is running systems */
  inTick: boolean
  /** Despawns requested mid-tick, applied once the tick's systems finish */
  pendingDespawns: Set<number>
  /** Pools indexed by Pooled.pool */
  pools: EntityPool[]
  projectilePool: EntityPool
  particlePool: EntityPool
  /** Contacts resolved during the current tick */
  contacts: ContactBuffer
  /** Trigger/other pair keys overlapping on the previous tick */
  triggerPairs: Set<number>
  /** Pair keys being collected by the current collision pass; swapped with triggerPairs */
  nextTriggerPairs: Set<number>
  /** Overlaps, audio cues and diagnostics accumulated over the current frame */
  frame: FrameEvents
  /** Input snapshot for the current frame */
  input: InputState
  /** Asset reference per Sprite entity */
  assetRefs: Map<number, string>
  /** Audio cue a trigger emits when something enters it */
  enterCues: Map<number, string>
  /** Problems already reported this frame (kind:eid) */
  frameProblems: Set<string>
  /** Problems already logged at least once per entity, forgotten when the entity goes away */
  loggedProblems: Map<number, Set<DiagnosticKind>>
  /** Entities spawned by the current scene */
  sceneEntities: Set<number>
  /** Scratch box for hot paths */
  scratchAabb: Aabb
}

/**
 * Create a new game world
 *
 * @throws ConfigurationError if the config overrides are invalid
 */
export function createGameWorld(options: GameWorldOptions = {}): GameWorld {
  const config = resolveEngineConfig(options.config)
  const baseWorld = bitCreateWorld()

  const world: GameWorld = {
    ...baseWorld,
    tick: 0,
    time: 0,
    dt: 1 / config.tickRate,
    config,
    log: options.log ?? createLogger('sim'),
    rng: new SeededRng(config.seed),
    spatialHash: createSpatialHash(config.cellSize),
    entities: new Set(),
    inTick: false,
    pendingDespawns: new Set(),
    pools: [],
    projectilePool: new EntityPool(0, 'projectiles', options.pools?.projectiles ?? PROJECTILE_POOL_SIZE),
    particlePool: new EntityPool(1, 'particles', options.pools?.particles ?? PARTICLE_POOL_SIZE),
    contacts: createContactBuffer(),
    triggerPairs: new Set(),
    nextTriggerPairs: new Set(),
    frame: createFrameEvents(),
    input: createInputState(),
    assetRefs: new Map(),
    enterCues: new Map(),
    frameProblems: new Set(),
    loggedProblems: new Map(),
    sceneEntities: new Set(),
    scratchAabb: createAabb(),
  }

  // Pools allocate their entities up front so spawning never grows the store
  for (const pool of [world.projectilePool, world.particlePool]) {
    world.pools[pool.id] = pool
    pool.populate(world)
  }
  return world
}

/** Create an extra pool registered on the world */
export function createPool(world: GameWorld, name: string, capacity: number): EntityPool {
  const pool = new EntityPool(world.pools.length, name, capacity)
  world.pools.push(pool)
  pool.populate(world)
  return pool
}

/**
 * Start a new render frame: clears the frame's overlap, audio and diagnostic
 * lists. Called by the host before the frame's first tick.
 */
export function beginFrame(world: GameWorld): void {
  world.frame = createFrameEvents()
  world.frameProblems.clear()
}

/**
 * Hand the frame's events to the caller and start fresh lists. Headless
 * callers that step without a host call this (or beginFrame) once per frame;
 * otherwise the lists keep growing.
 */
export function drainFrameEvents(world: GameWorld): FrameEvents {
  const events = world.frame
  beginFrame(world)
  return events
}
