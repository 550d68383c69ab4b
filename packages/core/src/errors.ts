/**
 * Engine error types
 *
 * Only construction/load-time problems and debug-build invariant checks throw.
 * Problems found while a tick is running are reported as diagnostics instead
 * (see sim/diagnostics.ts) so the loop keeps going.
 */

export class BrickyardError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Invalid engine configuration or scene document */
export class ConfigurationError extends BrickyardError {
  readonly problems: readonly string[]

  constructor(context: string, problems: readonly string[]) {
    super(`[${context}] ${problems.length} problem(s):\n  - ${problems.join('\n  - ')}`)
    this.problems = problems
  }
}

/** Scene load/unload attempted while a tick is executing */
export class SceneLifecycleError extends BrickyardError {}

/** Internal state that only an engine bug can produce */
export class InvariantViolationError extends BrickyardError {}
