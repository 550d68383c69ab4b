/**
 * Physics tuning constants.
 *
 * World units are pixels, +y points down (screen space), time is seconds.
 * These are the defaults `resolveEngineConfig` starts from.
 */

/** Simulation ticks per second. */
export const TICK_RATE = 60

/** Maximum fixed sub-steps run for a single render frame. */
export const MAX_SUB_STEPS = 5

/** Downward acceleration in px/s^2. */
export const GRAVITY = 1800

/** Terminal fall speed in px/s. */
export const MAX_FALL_SPEED = 900

/** Horizontal speed clamp in px/s. */
export const MAX_HORIZONTAL_SPEED = 1200

/** Broad-phase cell size in px. Most bodies should span 1-4 cells. */
export const CELL_SIZE = 64

/**
 * Separation (px) below which two boxes still count as touching.
 * Lets a body resting exactly on a floor keep its contact.
 */
export const CONTACT_SKIN = 0.01

/** Bounce along the contact normal (0 = fully inelastic). */
export const RESTITUTION = 0

/** Fraction of horizontal velocity removed per tick from resting, uncontrolled bodies. */
export const GROUND_DRAG = 0.25

/** Speeds below this (px/s) snap to zero. */
export const STOP_SPEED = 1

/** Mass assigned to dynamic bodies that do not declare one. */
export const DEFAULT_MASS = 1
