/**
 * Pool sizes and pooled-entity defaults.
 */

/** Projectile slots per simulation. */
export const PROJECTILE_POOL_SIZE = 64

/** Particle slots per simulation. */
export const PARTICLE_POOL_SIZE = 256

/** Seconds between shots. */
export const SHOOTER_COOLDOWN = 0.25

/** Projectile speed in px/s. */
export const PROJECTILE_SPEED = 600

/** Failsafe projectile lifetime in seconds. */
export const PROJECTILE_LIFETIME = 1.5

/** Projectile box edge in px. */
export const PROJECTILE_SIZE = 6
