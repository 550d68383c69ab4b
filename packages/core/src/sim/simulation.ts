/**
 * Simulation context
 *
 * One explicitly constructed value holding a world and its system order.
 * Hosts create it, load a scene, step it and dispose it; nothing about a
 * running game lives in module state.
 */

import type { InputState } from '../io/input'
import { createGameWorld, type GameWorld, type GameWorldOptions } from './world'
import { createSystemRegistry, stepWorld, type SystemRegistry } from './step'
import { registerCoreSystems } from './systems'
import { despawnEntity } from './entities'
import { unloadScene } from './scene'
import { SceneLifecycleError } from '../errors'

export interface Simulation {
  world: GameWorld
  systems: SystemRegistry
}

/**
 * Create a world with the core systems registered in canonical order
 *
 * @throws ConfigurationError if the config overrides are invalid
 */
export function createSimulation(options: GameWorldOptions = {}): Simulation {
  const world = createGameWorld(options)
  const systems = createSystemRegistry()
  registerCoreSystems(systems)
  return { world, systems }
}

/**
 * Run one fixed tick. Events collect on `world.frame` until the caller starts
 * a new frame with beginFrame or drainFrameEvents.
 */
export function stepSimulation(sim: Simulation, input?: Readonly<InputState>): void {
  stepWorld(sim.world, sim.systems, input)
}

/**
 * Tear down everything the simulation allocated: scene entities, pools and
 * any entity spawned outside a scene.
 *
 * @throws SceneLifecycleError when called during a tick
 */
export function disposeSimulation(sim: Simulation): void {
  const { world } = sim
  if (world.inTick) throw new SceneLifecycleError('cannot dispose a simulation while a tick is running')

  unloadScene(world)
  for (const pool of world.pools) pool.dispose()
  for (const eid of [...world.entities]) {
    despawnEntity(world, eid)
  }
  world.entities.clear()
  world.pools.length = 0
  sim.systems.clear()
  world.log.debug('simulation disposed')
}
