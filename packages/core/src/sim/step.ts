/**
 * Fixed Timestep Simulation
 *
 * The simulation advances in fixed ticks, independent of render frame rate.
 * Exactly one tick runs at a time; systems run in registration order and the
 * order is part of the contract (see registerCoreSystems).
 */

import type { GameWorld } from './world'
import type { InputState } from '../io/input'
import { copyInputState } from '../io/input'
import { flushDespawns } from './entities'
import { TICK_RATE } from './content/physics'

// ============================================================================
// Constants
// ============================================================================

/** Default time per tick in seconds */
export const TICK_S = 1 / TICK_RATE

/** Default time per tick in milliseconds */
export const TICK_MS = 1000 / TICK_RATE

// ============================================================================
// System Execution
// ============================================================================

/**
 * System function signature
 * Systems take the world and the fixed tick length in seconds
 */
export type System = (world: GameWorld, dt: number) => void

/**
 * Create a new system registry
 * Each simulation should have its own registry to avoid global state
 */
export function createSystemRegistry() {
  const systems: System[] = []

  return {
    /**
     * Register a system to run each tick
     * Systems run in registration order
     */
    register(system: System): void {
      systems.push(system)
    },

    clear(): void {
      systems.length = 0
    },

    count(): number {
      return systems.length
    },

    getSystems(): readonly System[] {
      return systems
    },
  }
}

export type SystemRegistry = ReturnType<typeof createSystemRegistry>

// ============================================================================
// Step Function
// ============================================================================

/**
 * Step the simulation forward by one tick
 *
 * @param world - The game world to update
 * @param systems - The system registry to use
 * @param input - Input snapshot for this tick; the world keeps the last one when omitted
 */
export function stepWorld(world: GameWorld, systems: SystemRegistry, input?: Readonly<InputState>): void {
  if (input) copyInputState(world.input, input)

  world.inTick = true
  world.contacts.count = 0
  try {
    for (const system of systems.getSystems()) {
      system(world, world.dt)
    }
  } finally {
    world.inTick = false
  }

  flushDespawns(world)

  world.tick++
  world.time += world.dt
}
