/**
 * Platformer controller constants.
 *
 * Tune these to adjust run speed, jump height and input forgiveness.
 * Scene entities may override any of them per controller.
 */

/** Horizontal run speed in px/s at full input. */
export const PLATFORMER_MAX_SPEED = 240

/** Launch speed of a jump in px/s (applied upward). */
export const PLATFORMER_JUMP_SPEED = 600

/** Grace period after leaving ground during which a jump still fires (seconds). */
export const COYOTE_TIME = 0.1

/** How long a jump press is remembered before landing (seconds). */
export const JUMP_BUFFER_TIME = 0.1

/** Fraction of horizontal velocity removed per tick on the ground with no input. */
export const GROUND_FRICTION = 0.35

/** Fraction of horizontal velocity removed per tick in the air with no input. */
export const AIR_FRICTION = 0.08

/** Particles emitted when a controlled body lands. */
export const LANDING_DUST_COUNT = 6

/** Landing dust launch speed in px/s. */
export const LANDING_DUST_SPEED = 60

/** Landing dust lifetime in seconds. */
export const LANDING_DUST_LIFETIME = 0.3
