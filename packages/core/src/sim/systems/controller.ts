/**
 * Controller System
 *
 * One update per controlled entity, dispatched on Controller.kind. Runs after
 * collision so the grounded flag reflects this tick's contacts.
 *
 * Platformer: Airborne/Grounded state machine with coyote time and jump
 * buffering. A jump fires when a press (this tick's or a buffered one) meets
 * ground or coyote time; either condition is enough and a jump clears both
 * timers.
 */

import { defineQuery, hasComponent } from 'bitecs'
import type { GameWorld } from '../world'
import {
  Transform,
  Velocity,
  Body,
  Controller,
  ControllerKind,
  Platformer,
  PlatformerStateType,
  Shooter,
} from '../components'
import { Button, hasButton, type InputState } from '../../io/input'
import { reportProblem } from '../diagnostics'
import { CollisionLayer, emitParticles, spawnProjectile } from '../prefabs'
import { POOL_EXHAUSTED } from '../EntityPool'
import { LANDING_DUST_COUNT, LANDING_DUST_SPEED, LANDING_DUST_LIFETIME } from '../content/platformer'
import { PROJECTILE_SIZE } from '../content/pools'

const controllerQuery = defineQuery([Controller])

export function controllerSystem(world: GameWorld, dt: number): void {
  for (const eid of controllerQuery(world)) {
    if (world.pendingDespawns.has(eid)) continue

    switch (Controller.kind[eid]) {
      case ControllerKind.PLATFORMER:
        updatePlatformer(world, eid, dt)
        break
      default:
        break
    }
  }
}

function hasRequiredComponents(world: GameWorld, eid: number): boolean {
  if (!hasComponent(world, Body, eid)) {
    reportProblem(world, 'missing-component', eid, 'platformer controller requires a Body; skipped')
    return false
  }
  if (!hasComponent(world, Platformer, eid) || !hasComponent(world, Velocity, eid) || !hasComponent(world, Transform, eid)) {
    reportProblem(world, 'missing-component', eid, 'platformer controller requires Platformer, Velocity and Transform; skipped')
    return false
  }
  return true
}

function updatePlatformer(world: GameWorld, eid: number, dt: number): void {
  if (!hasRequiredComponents(world, eid)) return

  const input = world.input
  const grounded = Body.grounded[eid] === 1
  const wasAirborne = Platformer.state[eid] === PlatformerStateType.AIRBORNE

  // Ground and coyote time
  if (grounded) {
    Platformer.state[eid] = PlatformerStateType.GROUNDED
    Platformer.coyoteTimer[eid] = Platformer.coyoteTime[eid]!
    if (wasAirborne) land(world, eid)
  } else {
    Platformer.state[eid] = PlatformerStateType.AIRBORNE
    Platformer.coyoteTimer[eid] = Math.max(0, Platformer.coyoteTimer[eid]! - dt)
  }

  // Jump buffer: a fresh press arms it, otherwise it drains
  const jumpDown = hasButton(input, Button.JUMP)
  const freshPress = jumpDown && Platformer.jumpWasDown[eid] === 0
  if (freshPress) {
    Platformer.jumpBufferTimer[eid] = Platformer.jumpBufferTime[eid]!
  } else {
    Platformer.jumpBufferTimer[eid] = Math.max(0, Platformer.jumpBufferTimer[eid]! - dt)
  }
  Platformer.jumpWasDown[eid] = jumpDown ? 1 : 0

  // A press counts this tick even with a zero-length buffer
  const requested = freshPress || Platformer.jumpBufferTimer[eid]! > 0
  if (requested && (grounded || Platformer.coyoteTimer[eid]! > 0)) {
    Velocity.y[eid] = -Platformer.jumpSpeed[eid]!
    Platformer.jumpBufferTimer[eid] = 0
    Platformer.coyoteTimer[eid] = 0
    Platformer.state[eid] = PlatformerStateType.AIRBORNE
    // Let gravity act on the next integration
    Body.grounded[eid] = 0
    world.frame.audio.push({ eid, cue: 'jump' })
  }

  applyHorizontal(world, eid, input, grounded)

  if (hasComponent(world, Shooter, eid)) updateShooter(world, eid, input, dt)
}

function applyHorizontal(world: GameWorld, eid: number, input: InputState, grounded: boolean): void {
  const moveX = Math.max(-1, Math.min(1, input.moveX))

  if (moveX !== 0) {
    const target = moveX * Platformer.maxSpeed[eid]!
    Platformer.targetVelocityX[eid] = target
    Velocity.x[eid] = target
    return
  }

  Platformer.targetVelocityX[eid] = 0
  const friction = grounded ? Platformer.groundFriction[eid]! : Platformer.airFriction[eid]!
  const vx = Velocity.x[eid]! * (1 - friction)
  Velocity.x[eid] = Math.abs(vx) < world.config.stopSpeed ? 0 : vx
}

function land(world: GameWorld, eid: number): void {
  world.frame.audio.push({ eid, cue: 'land' })
  emitParticles(world, eid, {
    x: Transform.x[eid]! + Body.offsetX[eid]! + Body.width[eid]! / 2,
    y: Transform.y[eid]! + Body.offsetY[eid]! + Body.height[eid]!,
    count: LANDING_DUST_COUNT,
    speed: LANDING_DUST_SPEED,
    lifetime: LANDING_DUST_LIFETIME,
    minAngle: -Math.PI,
    maxAngle: 0,
  })
}

function updateShooter(world: GameWorld, eid: number, input: InputState, dt: number): void {
  Shooter.cooldownRemaining[eid] = Math.max(0, Shooter.cooldownRemaining[eid]! - dt)
  if (input.moveX > 0) Shooter.facing[eid] = 1
  else if (input.moveX < 0) Shooter.facing[eid] = -1

  const fireDown = hasButton(input, Button.FIRE)
  const pressed = fireDown && Shooter.fireWasDown[eid] === 0
  Shooter.fireWasDown[eid] = fireDown ? 1 : 0
  if (!pressed || Shooter.cooldownRemaining[eid]! > 0) return

  const facing = Shooter.facing[eid]! < 0 ? -1 : 1
  const halfWidth = Body.width[eid]! / 2
  const centerX = Transform.x[eid]! + Body.offsetX[eid]! + halfWidth
  const centerY = Transform.y[eid]! + Body.offsetY[eid]! + Body.height[eid]! / 2
  const half = PROJECTILE_SIZE / 2

  const projectile = spawnProjectile(world, {
    ownerId: eid,
    x: centerX + facing * (halfWidth + half) - half,
    y: centerY - half,
    vx: facing * Shooter.projectileSpeed[eid]!,
    vy: 0,
    lifetime: Shooter.projectileLifetime[eid]!,
    layer: CollisionLayer.PROJECTILE,
    mask: CollisionLayer.WORLD | CollisionLayer.ACTOR,
  })
  if (projectile !== POOL_EXHAUSTED) {
    Shooter.cooldownRemaining[eid] = Shooter.cooldown[eid]!
  }
}
