/**
 * Render/audio publish boundary
 *
 * Once per frame the host asks for the state to draw. The core never calls a
 * renderer or audio API; it hands back plain records ordered by entity id.
 */

import { defineQuery, hasComponent } from 'bitecs'
import type { GameWorld } from '../sim/world'
import type { FrameEvents } from '../sim/events'
import type { AssetResolver } from './assets'
import { Transform, Sprite } from '../sim/components'
import { reportProblem } from '../sim/diagnostics'

export interface RenderItem<H> {
  eid: number
  x: number
  y: number
  /** Position before the last tick, for interpolation */
  prevX: number
  prevY: number
  rotation: number
  scaleX: number
  scaleY: number
  /** Resolved asset, null for entities without one or whose asset failed */
  handle: H | null
  /** Audio cues this entity triggered during the frame */
  audio: string[]
}

export interface RenderFrame<H> {
  tick: number
  items: RenderItem<H>[]
  /** Overlaps, every audio cue and diagnostics collected this frame */
  events: FrameEvents
}

const transformQuery = defineQuery([Transform])

/**
 * Build the frame's render list.
 *
 * An entity whose asset is still loading is left out and tried again next
 * frame. One whose asset failed is published without a handle and reported.
 */
export function publishFrame<H>(world: GameWorld, resolver: AssetResolver<H>): RenderFrame<H> {
  const cues = new Map<number, string[]>()
  for (const { eid, cue } of world.frame.audio) {
    const list = cues.get(eid)
    if (list) list.push(cue)
    else cues.set(eid, [cue])
  }

  const eids = [...transformQuery(world)].sort((a, b) => a - b)
  const items: RenderItem<H>[] = []

  for (const eid of eids) {
    let handle: H | null = null

    const ref = hasComponent(world, Sprite, eid) ? world.assetRefs.get(eid) : undefined
    if (ref !== undefined) {
      const resolution = resolver.resolve(ref)
      if (resolution.status === 'pending') continue
      if (resolution.status === 'failed') {
        reportProblem(world, 'asset-failed', eid, `asset '${ref}' failed: ${resolution.reason}`)
      } else {
        handle = resolution.handle
      }
    }

    items.push({
      eid,
      x: Transform.x[eid]!,
      y: Transform.y[eid]!,
      prevX: Transform.prevX[eid]!,
      prevY: Transform.prevY[eid]!,
      rotation: Transform.rotation[eid]!,
      scaleX: Transform.scaleX[eid]!,
      scaleY: Transform.scaleY[eid]!,
      handle,
      audio: cues.get(eid) ?? [],
    })
  }

  return { tick: world.tick, items, events: world.frame }
}
