/**
 * Game simulation module
 *
 * Contains ECS components, systems, and world management.
 * Runs identically in a browser or Node.
 */

export * from './components'
export * from './config'
export * from './events'
export * from './world'
export * from './step'
export * from './entities'
export * from './EntityPool'
export * from './diagnostics'
export * from './narrowphase'
export * from './prefabs'
export * from './scene'
export * from './simulation'
export * from './systems'
export * from './content'
export * from './SpatialHash'
