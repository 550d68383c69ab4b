/**
 * Diagnostics
 *
 * Per-entity problems found mid-tick are recorded on the frame and logged,
 * never thrown. Invariant checks are the one place a tick may throw, and only
 * when the world runs with `debug` enabled.
 */

import type { GameWorld } from './world'
import type { DiagnosticKind } from './events'
import { InvariantViolationError } from '../errors'

/**
 * Record a per-entity problem for this frame.
 *
 * A (kind, eid) pair is recorded at most once per frame, so a system that
 * trips over the same entity on every sub-step adds one entry. A (kind, eid)
 * pair is logged once for as long as the entity lives.
 */
export function reportProblem(world: GameWorld, kind: DiagnosticKind, eid: number, message: string): void {
  const frameKey = `${kind}:${eid}`
  if (!world.frameProblems.has(frameKey)) {
    world.frameProblems.add(frameKey)
    world.frame.diagnostics.push({ kind, eid, message, tick: world.tick })
  }

  let logged = world.loggedProblems.get(eid)
  if (!logged) {
    logged = new Set()
    world.loggedProblems.set(eid, logged)
  }
  if (logged.has(kind)) return
  logged.add(kind)

  if (kind === 'pool-exhausted') {
    world.log.debug({ kind, eid, tick: world.tick }, message)
  } else {
    world.log.warn({ kind, eid, tick: world.tick }, message)
  }
}

/** Let an entity id that was removed or recycled log its problems again */
export function forgetLoggedProblems(world: GameWorld, eid: number): void {
  world.loggedProblems.delete(eid)
}

/**
 * Check a condition only an engine bug can break.
 *
 * @returns the condition, so release builds can skip the offending operation
 * @throws InvariantViolationError when the condition fails and `config.debug` is set
 */
export function invariant(world: GameWorld, condition: boolean, message: string): boolean {
  if (condition) return true
  if (world.config.debug) throw new InvariantViolationError(message)
  world.log.error({ tick: world.tick }, `invariant violated: ${message}`)
  return false
}
