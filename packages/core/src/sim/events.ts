/**
 * Per-tick and per-frame output records
 *
 * Systems append to these lists instead of invoking callbacks; the host drains
 * them once the frame's ticks are done, so nothing re-enters the world while a
 * system is mutating it.
 */

/** One resolved contact. Recomputed every tick and never carried over. */
export interface Contact {
  a: number
  b: number
  /** Unit normal pointing from a to b */
  normalX: number
  normalY: number
  /** Penetration along the normal (0 for resting contact) */
  depth: number
  /** (vB - vA) · n before the velocity response; negative means approaching */
  relativeVelocity: number
}

export type OverlapPhase = 'enter' | 'stay' | 'exit'

export interface OverlapEvent {
  trigger: number
  other: number
  phase: OverlapPhase
}

export interface AudioCue {
  eid: number
  cue: string
}

export type DiagnosticKind =
  | 'missing-component'
  | 'invalid-aabb'
  | 'asset-failed'
  | 'numerical'
  | 'pool-exhausted'

export interface Diagnostic {
  kind: DiagnosticKind
  eid: number
  message: string
  tick: number
}

export interface FrameEvents {
  overlaps: OverlapEvent[]
  audio: AudioCue[]
  diagnostics: Diagnostic[]
}

export function createFrameEvents(): FrameEvents {
  return { overlaps: [], audio: [], diagnostics: [] }
}

/**
 * Reusable contact storage. Contact objects are kept between ticks and
 * overwritten, only `count` entries are live.
 */
export interface ContactBuffer {
  items: Contact[]
  count: number
}

export function createContactBuffer(): ContactBuffer {
  return { items: [], count: 0 }
}

/** Claim the next contact slot, growing the buffer only when it is full */
export function nextContact(buffer: ContactBuffer): Contact {
  let contact = buffer.items[buffer.count]
  if (!contact) {
    contact = { a: 0, b: 0, normalX: 0, normalY: 0, depth: 0, relativeVelocity: 0 }
    buffer.items.push(contact)
  }
  buffer.count++
  return contact
}

/** Live contacts for the current tick */
export function liveContacts(buffer: ContactBuffer): Contact[] {
  return buffer.items.slice(0, buffer.count)
}
