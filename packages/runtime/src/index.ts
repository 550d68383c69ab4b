/**
 * @brickyard/runtime
 *
 * Frame driver around @brickyard/core: the fixed-timestep loop, input
 * latching, asset loading and the per-frame publish to a renderer.
 */

export * from './engine'
export * from './assets'
