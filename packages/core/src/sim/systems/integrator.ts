/**
 * Integrator System
 *
 * Semi-implicit Euler over dynamic bodies: velocity first, then position from
 * the new velocity. Gravity skips bodies the previous collision pass found
 * resting on something. Stores the previous position for render interpolation.
 */

import { defineQuery, hasComponent } from 'bitecs'
import type { GameWorld } from '../world'
import { Transform, Velocity, Body, BodyKind, Platformer } from '../components'
import { reportProblem } from '../diagnostics'

const dynamicBodyQuery = defineQuery([Transform, Velocity, Body])

/**
 * Integrator system - gravity, velocity clamps, position update
 *
 * @param world - The game world
 * @param dt - Delta time in seconds
 */
export function integratorSystem(world: GameWorld, dt: number): void {
  const { gravity, maxFallSpeed, maxHorizontalSpeed, groundDrag, stopSpeed } = world.config

  for (const eid of dynamicBodyQuery(world)) {
    if (Body.kind[eid] !== BodyKind.DYNAMIC) continue

    const x = Transform.x[eid]!
    const y = Transform.y[eid]!
    if (Number.isFinite(x)) Transform.prevX[eid] = x
    if (Number.isFinite(y)) Transform.prevY[eid] = y

    let vx = Velocity.x[eid]!
    let vy = Velocity.y[eid]!
    if (!Number.isFinite(vx) || !Number.isFinite(vy)) {
      reportProblem(world, 'numerical', eid, `non-finite velocity (${vx}, ${vy}) reset to zero`)
      vx = 0
      vy = 0
    }

    const grounded = Body.grounded[eid] === 1
    if (!grounded) {
      vy += gravity * Body.gravityScale[eid]! * dt
    } else {
      // Controlled bodies apply their own friction
      if (!hasComponent(world, Platformer, eid)) vx *= 1 - groundDrag
      if (Math.abs(vy) < stopSpeed) vy = 0
    }
    if (Math.abs(vx) < stopSpeed) vx = 0

    if (vx > maxHorizontalSpeed) vx = maxHorizontalSpeed
    else if (vx < -maxHorizontalSpeed) vx = -maxHorizontalSpeed
    if (vy > maxFallSpeed) vy = maxFallSpeed
    else if (vy < -maxFallSpeed) vy = -maxFallSpeed

    let nextX = x + vx * dt
    let nextY = y + vy * dt
    if (!Number.isFinite(nextX) || !Number.isFinite(nextY)) {
      reportProblem(world, 'numerical', eid, `non-finite position (${nextX}, ${nextY}) restored to last valid position`)
      nextX = Number.isFinite(Transform.prevX[eid]!) ? Transform.prevX[eid]! : 0
      nextY = Number.isFinite(Transform.prevY[eid]!) ? Transform.prevY[eid]! : 0
      vx = 0
      vy = 0
    }

    Velocity.x[eid] = vx
    Velocity.y[eid] = vy
    Transform.x[eid] = nextX
    Transform.y[eid] = nextY
  }
}
