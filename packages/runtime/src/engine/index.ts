/**
 * Engine module exports
 */

export { GameLoop, MAX_FRAME_DELTA_MS, type GameLoopOptions, type RenderCallback, type UpdateCallback } from './GameLoop'
export { ManualScheduler, timeoutScheduler, type FrameScheduler } from './FrameScheduler'
export { InputLatch, type InputSource } from './InputLatch'
export { SimulationDriver } from './SimulationDriver'
export { GameHost, type FrameSink, type GameHostOptions, type HostFrame } from './GameHost'
