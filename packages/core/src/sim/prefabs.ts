/**
 * Entity Prefabs
 *
 * Factory functions for creating common entity types with
 * all required components and default values.
 */

import { addComponent } from 'bitecs'
import type { GameWorld } from './world'
import {
  Transform,
  Velocity,
  Body,
  BodyKind,
  type BodyKindValue,
  Controller,
  ControllerKind,
  Platformer,
  PlatformerStateType,
  Shooter,
  Projectile,
  Particle,
  Sprite,
} from './components'
import { spawnEntity } from './entities'
import { POOL_EXHAUSTED } from './EntityPool'
import { reportProblem } from './diagnostics'
import { resolvePlatformerTuning, type PlatformerTuning } from './config'
import { DEFAULT_MASS } from './content/physics'
import { ConfigurationError } from '../errors'
import {
  SHOOTER_COOLDOWN,
  PROJECTILE_SPEED,
  PROJECTILE_LIFETIME,
  PROJECTILE_SIZE,
} from './content/pools'

// ============================================================================
// Collision Layers
// ============================================================================

/**
 * Collision layer bits
 * Used to filter which entities can collide with each other
 */
export const CollisionLayer = {
  NONE: 0,
  WORLD: 1 << 0,
  ACTOR: 1 << 1,
  PROJECTILE: 1 << 2,
  TRIGGER: 1 << 3,
  ALL: 0xffffffff,
} as const

// ============================================================================
// Building blocks
// ============================================================================

export interface BodyOptions {
  kind: BodyKindValue
  width: number
  height: number
  offsetX?: number
  offsetY?: number
  layer?: number
  mask?: number
  /** Ignored for static bodies and triggers; Infinity makes a dynamic body immovable */
  mass?: number
  noSelfCollide?: boolean
  gravityScale?: number
}

/** Place an entity: attaches Transform and sets position, rotation and scale */
export function addTransform(world: GameWorld, eid: number, x: number, y: number, rotation = 0): void {
  addComponent(world, Transform, eid)
  Transform.x[eid] = x
  Transform.y[eid] = y
  Transform.prevX[eid] = x
  Transform.prevY[eid] = y
  Transform.rotation[eid] = rotation
  Transform.scaleX[eid] = 1
  Transform.scaleY[eid] = 1
}

/** Attach a Body (and Velocity for dynamic bodies) */
export function addBody(world: GameWorld, eid: number, options: BodyOptions): void {
  addComponent(world, Body, eid)
  Body.kind[eid] = options.kind
  Body.width[eid] = options.width
  Body.height[eid] = options.height
  Body.offsetX[eid] = options.offsetX ?? 0
  Body.offsetY[eid] = options.offsetY ?? 0
  Body.layer[eid] = options.layer ?? CollisionLayer.WORLD
  Body.mask[eid] = options.mask ?? CollisionLayer.ALL
  Body.noSelfCollide[eid] = options.noSelfCollide ? 1 : 0
  Body.gravityScale[eid] = options.gravityScale ?? 1
  Body.grounded[eid] = 0

  if (options.kind === BodyKind.DYNAMIC) {
    const mass = options.mass ?? DEFAULT_MASS
    if (!(mass > 0)) throw new ConfigurationError('Body', [`mass must be > 0 (got ${mass})`])
    Body.invMass[eid] = 1 / mass
    addComponent(world, Velocity, eid)
  } else {
    Body.invMass[eid] = 0
  }
}

/** Attach a platformer controller with the given tuning overrides */
export function addPlatformer(world: GameWorld, eid: number, tuning?: Partial<PlatformerTuning>): void {
  const resolved = resolvePlatformerTuning(tuning)
  addComponent(world, Controller, eid)
  Controller.kind[eid] = ControllerKind.PLATFORMER

  addComponent(world, Platformer, eid)
  Platformer.state[eid] = PlatformerStateType.AIRBORNE
  Platformer.coyoteTimer[eid] = 0
  Platformer.jumpBufferTimer[eid] = 0
  Platformer.targetVelocityX[eid] = 0
  Platformer.jumpWasDown[eid] = 0
  Platformer.maxSpeed[eid] = resolved.maxSpeed
  Platformer.jumpSpeed[eid] = resolved.jumpSpeed
  Platformer.coyoteTime[eid] = resolved.coyoteTime
  Platformer.jumpBufferTime[eid] = resolved.jumpBufferTime
  Platformer.groundFriction[eid] = resolved.groundFriction
  Platformer.airFriction[eid] = resolved.airFriction
}

export interface ShooterOptions {
  cooldown?: number
  projectileSpeed?: number
  projectileLifetime?: number
}

export function addShooter(world: GameWorld, eid: number, options: ShooterOptions = {}): void {
  addComponent(world, Shooter, eid)
  Shooter.cooldown[eid] = options.cooldown ?? SHOOTER_COOLDOWN
  Shooter.cooldownRemaining[eid] = 0
  Shooter.projectileSpeed[eid] = options.projectileSpeed ?? PROJECTILE_SPEED
  Shooter.projectileLifetime[eid] = options.projectileLifetime ?? PROJECTILE_LIFETIME
  Shooter.facing[eid] = 1
  Shooter.fireWasDown[eid] = 0
}

/** Give an entity a visual asset reference, resolved when frames are published */
export function setSpriteAsset(world: GameWorld, eid: number, assetRef: string): void {
  addComponent(world, Sprite, eid)
  world.assetRefs.set(eid, assetRef)
}

// ============================================================================
// Prefabs
// ============================================================================

/** Immovable level geometry */
export function spawnStaticBody(
  world: GameWorld,
  x: number,
  y: number,
  width: number,
  height: number,
  layer: number = CollisionLayer.WORLD,
  mask: number = CollisionLayer.ALL
): number {
  const eid = spawnEntity(world)
  addTransform(world, eid, x, y)
  addBody(world, eid, { kind: BodyKind.STATIC, width, height, layer, mask })
  return eid
}

export function spawnDynamicBody(
  world: GameWorld,
  x: number,
  y: number,
  options: Omit<BodyOptions, 'kind'>
): number {
  const eid = spawnEntity(world)
  addTransform(world, eid, x, y)
  addBody(world, eid, { ...options, kind: BodyKind.DYNAMIC })
  return eid
}

/** Overlap-only volume; never pushed and never pushes */
export function spawnTrigger(
  world: GameWorld,
  x: number,
  y: number,
  width: number,
  height: number,
  options: { layer?: number; mask?: number; enterCue?: string } = {}
): number {
  const eid = spawnEntity(world)
  addTransform(world, eid, x, y)
  addBody(world, eid, {
    kind: BodyKind.TRIGGER,
    width,
    height,
    layer: options.layer ?? CollisionLayer.TRIGGER,
    mask: options.mask ?? CollisionLayer.ACTOR,
  })
  if (options.enterCue) world.enterCues.set(eid, options.enterCue)
  return eid
}

export interface PlatformerOptions {
  width: number
  height: number
  layer?: number
  mask?: number
  mass?: number
  tuning?: Partial<PlatformerTuning>
}

/** Dynamic body driven by the platformer controller */
export function spawnPlatformer(world: GameWorld, x: number, y: number, options: PlatformerOptions): number {
  const eid = spawnEntity(world)
  addTransform(world, eid, x, y)
  addBody(world, eid, {
    kind: BodyKind.DYNAMIC,
    width: options.width,
    height: options.height,
    layer: options.layer ?? CollisionLayer.ACTOR,
    mask: options.mask ?? CollisionLayer.WORLD,
    mass: options.mass,
  })
  addPlatformer(world, eid, options.tuning)
  return eid
}

// ============================================================================
// Pooled prefabs
// ============================================================================

export interface ProjectileSpawn {
  ownerId: number
  x: number
  y: number
  vx: number
  vy: number
  lifetime: number
  layer: number
  mask: number
}

/**
 * Fire a projectile from the projectile pool
 * @returns the projectile id, or POOL_EXHAUSTED when the pool is full
 */
export function spawnProjectile(world: GameWorld, spawn: ProjectileSpawn): number {
  const eid = world.projectilePool.acquire()
  if (eid === POOL_EXHAUSTED) {
    reportProblem(world, 'pool-exhausted', spawn.ownerId, `pool '${world.projectilePool.name}' exhausted, projectile dropped`)
    return POOL_EXHAUSTED
  }

  addTransform(world, eid, spawn.x, spawn.y)
  addBody(world, eid, {
    kind: BodyKind.DYNAMIC,
    width: PROJECTILE_SIZE,
    height: PROJECTILE_SIZE,
    layer: spawn.layer,
    mask: spawn.mask,
    gravityScale: 0,
    noSelfCollide: true,
  })
  Velocity.x[eid] = spawn.vx
  Velocity.y[eid] = spawn.vy

  addComponent(world, Projectile, eid)
  Projectile.ownerId[eid] = spawn.ownerId
  Projectile.lifetime[eid] = spawn.lifetime
  return eid
}

export interface ParticleBurst {
  x: number
  y: number
  count: number
  /** Launch speed in px/s */
  speed: number
  /** Seconds each particle lives */
  lifetime: number
  /** Spread angle range in radians; y is down, so [-π, 0] sprays upward */
  minAngle: number
  maxAngle: number
}

/**
 * Emit particles from the particle pool. Directions come from the world RNG.
 * When the pool runs dry the rest of the burst is dropped.
 *
 * @param sourceEid - entity the burst is attributed to in diagnostics
 * @returns number of particles emitted
 */
export function emitParticles(world: GameWorld, sourceEid: number, burst: ParticleBurst): number {
  for (let i = 0; i < burst.count; i++) {
    const eid = world.particlePool.acquire()
    if (eid === POOL_EXHAUSTED) {
      reportProblem(
        world,
        'pool-exhausted',
        sourceEid,
        `pool '${world.particlePool.name}' exhausted, dropped ${burst.count - i} particle(s)`
      )
      return i
    }

    const angle = world.rng.nextRange(burst.minAngle, burst.maxAngle)
    addTransform(world, eid, burst.x, burst.y)
    addComponent(world, Velocity, eid)
    Velocity.x[eid] = Math.cos(angle) * burst.speed
    Velocity.y[eid] = Math.sin(angle) * burst.speed
    addComponent(world, Particle, eid)
    Particle.lifetime[eid] = burst.lifetime
    Particle.maxLifetime[eid] = burst.lifetime
  }
  return burst.count
}
