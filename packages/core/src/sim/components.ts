/**
 * ECS Components
 *
 * Components are data stores indexed by entity ID using Structure of Arrays (SoA).
 * All simulation state lives in these arrays; entities are bare ids that own
 * nothing and components never point back at their entity.
 */

/** Maximum entities supported (entity ids index these arrays directly) */
export const MAX_ENTITIES = 16384

// ============================================================================
// Spatial
// ============================================================================

/** Position (px), rotation (radians) and non-uniform scale */
export const Transform = {
  x: new Float32Array(MAX_ENTITIES),
  y: new Float32Array(MAX_ENTITIES),
  rotation: new Float32Array(MAX_ENTITIES),
  scaleX: new Float32Array(MAX_ENTITIES),
  scaleY: new Float32Array(MAX_ENTITIES),
  /** Position before the last integration step, for render interpolation */
  prevX: new Float32Array(MAX_ENTITIES),
  prevY: new Float32Array(MAX_ENTITIES),
}

/** Velocity in px/s */
export const Velocity = {
  x: new Float32Array(MAX_ENTITIES),
  y: new Float32Array(MAX_ENTITIES),
}

// ============================================================================
// Physics
// ============================================================================

export const BodyKind = {
  /** Immovable collider, never integrated */
  STATIC: 0,
  /** Integrated every step and pushed out of contacts */
  DYNAMIC: 1,
  /** Reports overlaps, never resolved */
  TRIGGER: 2,
} as const

export type BodyKindValue = (typeof BodyKind)[keyof typeof BodyKind]

/** Axis-aligned box collider, offset from the transform */
export const Body = {
  offsetX: new Float32Array(MAX_ENTITIES),
  offsetY: new Float32Array(MAX_ENTITIES),
  width: new Float32Array(MAX_ENTITIES),
  height: new Float32Array(MAX_ENTITIES),
  kind: new Uint8Array(MAX_ENTITIES),
  /** Layers this body belongs to */
  layer: new Uint32Array(MAX_ENTITIES),
  /** Layers this body wants to interact with */
  mask: new Uint32Array(MAX_ENTITIES),
  /** 1 / mass; 0 for static bodies */
  invMass: new Float32Array(MAX_ENTITIES),
  /** Multiplier on world gravity (projectiles fly flat with 0) */
  gravityScale: new Float32Array(MAX_ENTITIES),
  /** Set by the collision pass when resting on something below */
  grounded: new Uint8Array(MAX_ENTITIES),
  /** Skip pairs with bodies on the same layer that also set this */
  noSelfCollide: new Uint8Array(MAX_ENTITIES),
}

// ============================================================================
// Behaviour
// ============================================================================

/** Closed set of controller variants dispatched by controllerSystem */
export const ControllerKind = {
  NONE: 0,
  PLATFORMER: 1,
} as const

export type ControllerKindValue = (typeof ControllerKind)[keyof typeof ControllerKind]

export const Controller = {
  kind: new Uint8Array(MAX_ENTITIES),
}

export const PlatformerStateType = {
  AIRBORNE: 0,
  GROUNDED: 1,
} as const

/** Per-entity platformer state and tuning */
export const Platformer = {
  state: new Uint8Array(MAX_ENTITIES),
  /** Seconds of coyote time left */
  coyoteTimer: new Float32Array(MAX_ENTITIES),
  /** Seconds a buffered jump press stays valid */
  jumpBufferTimer: new Float32Array(MAX_ENTITIES),
  /** Horizontal velocity requested by input this tick */
  targetVelocityX: new Float32Array(MAX_ENTITIES),
  /** Whether jump was held last tick (for press-edge detection) */
  jumpWasDown: new Uint8Array(MAX_ENTITIES),
  maxSpeed: new Float32Array(MAX_ENTITIES),
  jumpSpeed: new Float32Array(MAX_ENTITIES),
  coyoteTime: new Float32Array(MAX_ENTITIES),
  jumpBufferTime: new Float32Array(MAX_ENTITIES),
  groundFriction: new Float32Array(MAX_ENTITIES),
  airFriction: new Float32Array(MAX_ENTITIES),
}

/** Fires pooled projectiles on the FIRE press edge */
export const Shooter = {
  cooldown: new Float32Array(MAX_ENTITIES),
  cooldownRemaining: new Float32Array(MAX_ENTITIES),
  projectileSpeed: new Float32Array(MAX_ENTITIES),
  projectileLifetime: new Float32Array(MAX_ENTITIES),
  /** Last horizontal facing: -1 or 1 */
  facing: new Int8Array(MAX_ENTITIES),
  fireWasDown: new Uint8Array(MAX_ENTITIES),
}

// ============================================================================
// Transient (pooled)
// ============================================================================

/** Projectile.ownerId value for projectiles nobody fired */
export const NO_OWNER = -1

export const Projectile = {
  /** Entity that fired this projectile */
  ownerId: new Int32Array(MAX_ENTITIES),
  /** Remaining lifetime in seconds (failsafe despawn) */
  lifetime: new Float32Array(MAX_ENTITIES),
}

export const Particle = {
  lifetime: new Float32Array(MAX_ENTITIES),
  maxLifetime: new Float32Array(MAX_ENTITIES),
}

/** Slot bookkeeping for entities owned by an EntityPool */
export const Pooled = {
  pool: new Uint8Array(MAX_ENTITIES),
  slot: new Uint32Array(MAX_ENTITIES),
  active: new Uint8Array(MAX_ENTITIES),
}

// ============================================================================
// Presentation
// ============================================================================

/**
 * Tag for entities with a visual asset. The asset reference string lives in
 * world.assetRefs since typed arrays cannot hold it.
 * Note: Array is required for bitECS query compatibility, even though values aren't read
 */
export const Sprite = {
  _tag: new Uint8Array(MAX_ENTITIES),
}

// ============================================================================
// Registry
// ============================================================================

export type ComponentStore = Readonly<Record<string, Float32Array | Uint8Array | Uint32Array | Int32Array | Int8Array>>

/** Every engine component, in detach order. Pooled is last so it can be kept. */
export const ENGINE_COMPONENTS: readonly ComponentStore[] = [
  Transform,
  Velocity,
  Body,
  Controller,
  Platformer,
  Shooter,
  Projectile,
  Particle,
  Sprite,
  Pooled,
]

/** Fields whose default is not zero */
const NON_ZERO_DEFAULTS = new Map<ComponentStore, ReadonlyArray<readonly [string, number]>>([
  [Transform, [['scaleX', 1], ['scaleY', 1]]],
  [Body, [['gravityScale', 1]]],
])

/** Reset one entity's row of a component to its default values */
export function resetComponentRow(store: ComponentStore, eid: number): void {
  for (const field of Object.values(store)) {
    field[eid] = 0
  }
  const defaults = NON_ZERO_DEFAULTS.get(store)
  if (!defaults) return
  for (const [name, value] of defaults) {
    const field = store[name]
    if (field) field[eid] = value
  }
}
