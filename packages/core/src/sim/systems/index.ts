/**
 * ECS Systems
 *
 * Systems are functions that operate on entities with specific components.
 * They run in a defined order each simulation tick.
 */

import type { SystemRegistry } from '../step'

import { integratorSystem } from './integrator'
import { spatialHashSystem } from './spatialHash'
import { collisionSystem } from './collision'
import { controllerSystem } from './controller'
import { projectileSystem } from './projectile'
import { particleSystem } from './particle'

export {
  integratorSystem,
  spatialHashSystem,
  collisionSystem,
  controllerSystem,
  projectileSystem,
  particleSystem,
}

/**
 * Register all core systems in the correct order
 *
 * Order matters:
 * 1. Integrator - gravity and velocity move every dynamic body
 * 2. Spatial hash - broad phase rebuilt from the post-move boxes
 * 3. Collision - contacts, push-out, grounded flags, trigger overlaps
 * 4. Controller - reads this tick's grounded state, sets next velocities
 * 5. Projectile - lifetimes
 * 6. Particle - cosmetic, last
 */
export function registerCoreSystems(systems: SystemRegistry): void {
  systems.register(integratorSystem)
  systems.register(spatialHashSystem)
  systems.register(collisionSystem)
  systems.register(controllerSystem)
  systems.register(projectileSystem)
  systems.register(particleSystem)
}
