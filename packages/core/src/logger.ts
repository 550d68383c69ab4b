/**
 * Logger
 *
 * pino loggers tagged with the emitting component. Level comes from
 * LOG_LEVEL (default 'info'); the test config sets it to 'silent'.
 */

import pino from 'pino'

export type Logger = pino.Logger

function envLevel(): string {
  if (typeof process === 'undefined') return 'info'
  return process.env.LOG_LEVEL ?? 'info'
}

/**
 * Create a logger whose entries carry a `component` field
 * @param component - Component name for filtering (e.g. 'sim', 'loop', 'assets')
 */
export function createLogger(component: string, level = envLevel()): Logger {
  return pino({
    level,
    base: { component },
  })
}
