/**
 * @brickyard/core
 *
 * The deterministic 2D simulation core: entity store, pools, broad and
 * narrow phase, integrator, controllers and the publish boundary.
 */

// Math utilities
export * from './math'

// Simulation (ECS, components, systems)
export * from './sim'

// Input, asset and render boundaries
export * from './io'

export * from './errors'
export * from './logger'
