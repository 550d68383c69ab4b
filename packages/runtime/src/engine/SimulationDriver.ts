import { stepSimulation, type InputState, type Simulation } from '@brickyard/core'

/**
 * Steps a simulation one fixed tick at a time with the frame's input.
 */
export class SimulationDriver {
  private readonly sim: Simulation

  constructor(sim: Simulation) {
    this.sim = sim
  }

  /** Fixed tick length in milliseconds */
  get tickMs(): number {
    return 1000 / this.sim.world.config.tickRate
  }

  get maxSubSteps(): number {
    return this.sim.world.config.maxSubSteps
  }

  step(input: InputState): void {
    stepSimulation(this.sim, input)
  }
}
