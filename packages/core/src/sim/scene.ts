/**
 * Scene documents
 *
 * A scene is the deserialized form of an editor-authored level: a flat list
 * of entities with placement, an optional body, controller, shooter, asset
 * and trigger cue. The encoding is up to the caller; this module only sees
 * the in-memory shape.
 *
 * Loading validates the whole document before spawning anything, so a bad
 * document never leaves a half-built scene behind. Load and unload are only
 * legal between ticks.
 */

import type { GameWorld } from './world'
import { BodyKind, Transform, type BodyKindValue } from './components'
import { ConfigurationError, SceneLifecycleError } from '../errors'
import { checkPlatformerTuning, DEFAULT_PLATFORMER_TUNING, type PlatformerTuning } from './config'
import { despawnEntity, spawnEntity } from './entities'
import { clearSpatialHash } from './SpatialHash'
import {
  CollisionLayer,
  addTransform,
  addBody,
  addPlatformer,
  addShooter,
  setSpriteAsset,
  type ShooterOptions,
} from './prefabs'

// ============================================================================
// Document types
// ============================================================================

export type SceneBodyKind = 'static' | 'dynamic' | 'trigger'

export interface SceneTransform {
  x: number
  y: number
  rotation?: number
  scaleX?: number
  scaleY?: number
}

export interface SceneBody {
  kind: SceneBodyKind
  /** Box relative to the transform position */
  aabb: { x: number; y: number; width: number; height: number }
  layer?: number
  mask?: number
  /** Dynamic bodies only */
  mass?: number
  noSelfCollide?: boolean
  gravityScale?: number
}

export type SceneController =
  | { type: 'platformer'; tuning?: Partial<PlatformerTuning> }
  | { type: 'none' }

export interface SceneEntity {
  /** Authoring name, unique within the document */
  id: string
  transform: SceneTransform
  body?: SceneBody
  controller?: SceneController
  shooter?: ShooterOptions
  /** Opaque asset reference handed to the asset resolver */
  asset?: string
  /** Audio cue played when something enters this trigger */
  enterCue?: string
}

export interface SceneBounds {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

export interface SceneDocument {
  entities: SceneEntity[]
  /** When present, every entity must be placed inside */
  bounds?: SceneBounds
}

const BODY_KINDS: Record<SceneBodyKind, BodyKindValue> = {
  static: BodyKind.STATIC,
  dynamic: BodyKind.DYNAMIC,
  trigger: BodyKind.TRIGGER,
}

const DEFAULT_LAYERS: Record<SceneBodyKind, { layer: number; mask: number }> = {
  static: { layer: CollisionLayer.WORLD, mask: CollisionLayer.ALL },
  dynamic: { layer: CollisionLayer.ACTOR, mask: CollisionLayer.WORLD | CollisionLayer.ACTOR },
  trigger: { layer: CollisionLayer.TRIGGER, mask: CollisionLayer.ACTOR },
}

// ============================================================================
// Validation
// ============================================================================

function isBitset(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff
}

function isBodyKind(value: string): value is SceneBodyKind {
  return Object.hasOwn(BODY_KINDS, value)
}

function checkNumbers(problems: string[], where: string, values: Record<string, number | undefined>): void {
  for (const [name, value] of Object.entries(values)) {
    if (value !== undefined && !Number.isFinite(value)) {
      problems.push(`${where}: ${name} must be a finite number (got ${value})`)
    }
  }
}

function validateBody(problems: string[], where: string, body: SceneBody): void {
  if (!isBodyKind(body.kind)) {
    problems.push(`${where}: unknown body kind '${body.kind}'`)
    return
  }
  const { x, y, width, height } = body.aabb
  checkNumbers(problems, `${where}.aabb`, { x, y, width, height })
  if (width <= 0 || height <= 0) {
    problems.push(`${where}.aabb: width and height must be > 0 (got ${width}x${height})`)
  }
  if (body.layer !== undefined && !isBitset(body.layer)) problems.push(`${where}: layer must be a 32-bit unsigned integer`)
  if (body.mask !== undefined && !isBitset(body.mask)) problems.push(`${where}: mask must be a 32-bit unsigned integer`)
  if (body.mass !== undefined) {
    if (body.kind !== 'dynamic') problems.push(`${where}: mass only applies to dynamic bodies`)
    else if (!(body.mass > 0)) problems.push(`${where}: mass must be > 0 (got ${body.mass})`)
  }
  checkNumbers(problems, where, { gravityScale: body.gravityScale })
}

/**
 * Check a document without touching any world.
 * @returns every problem found; empty when the document can be loaded
 */
export function validateScene(doc: SceneDocument): string[] {
  const problems: string[] = []
  const seen = new Set<string>()

  if (doc.bounds) {
    const { minX, minY, maxX, maxY } = doc.bounds
    checkNumbers(problems, 'bounds', { minX, minY, maxX, maxY })
    if (maxX <= minX || maxY <= minY) problems.push('bounds: max must be greater than min on both axes')
  }

  doc.entities.forEach((entity, index) => {
    const where = entity.id ? `entity '${entity.id}'` : `entity #${index}`
    if (!entity.id) problems.push(`${where}: id must be a non-empty string`)
    else if (seen.has(entity.id)) problems.push(`${where}: duplicate id`)
    seen.add(entity.id)

    const { x, y, rotation, scaleX, scaleY } = entity.transform
    checkNumbers(problems, `${where}.transform`, { x, y, rotation, scaleX, scaleY })
    const bounds = doc.bounds
    if (bounds && (x < bounds.minX || x > bounds.maxX || y < bounds.minY || y > bounds.maxY)) {
      problems.push(`${where}: placed at (${x}, ${y}) outside the scene bounds`)
    }

    if (entity.body) validateBody(problems, `${where}.body`, entity.body)

    const controller = entity.controller
    if (controller) {
      if (controller.type === 'platformer') {
        const tuning = { ...DEFAULT_PLATFORMER_TUNING, ...controller.tuning }
        for (const problem of checkPlatformerTuning(tuning)) problems.push(`${where}.controller: ${problem}`)
      } else if (controller.type !== 'none') {
        problems.push(`${where}: unknown controller type`)
      }
    }

    if (entity.shooter) {
      if (controller?.type !== 'platformer') problems.push(`${where}: shooter requires a platformer controller`)
      const { cooldown, projectileSpeed, projectileLifetime } = entity.shooter
      checkNumbers(problems, `${where}.shooter`, { cooldown, projectileSpeed, projectileLifetime })
    }

    if (entity.asset !== undefined && entity.asset.length === 0) problems.push(`${where}: asset must be a non-empty string`)
    if (entity.enterCue !== undefined && entity.body?.kind !== 'trigger') {
      problems.push(`${where}: enterCue only applies to trigger bodies`)
    }
  })

  return problems
}

// ============================================================================
// Load / unload
// ============================================================================

function assertBetweenTicks(world: GameWorld, action: string): void {
  if (world.inTick) throw new SceneLifecycleError(`cannot ${action} a scene while a tick is running`)
}

function spawnSceneEntity(world: GameWorld, entity: SceneEntity): number {
  const eid = spawnEntity(world)
  const { x, y, rotation, scaleX, scaleY } = entity.transform
  addTransform(world, eid, x, y, rotation ?? 0)
  Transform.scaleX[eid] = scaleX ?? 1
  Transform.scaleY[eid] = scaleY ?? 1

  const body = entity.body
  if (body) {
    const defaults = DEFAULT_LAYERS[body.kind]
    addBody(world, eid, {
      kind: BODY_KINDS[body.kind],
      offsetX: body.aabb.x,
      offsetY: body.aabb.y,
      width: body.aabb.width,
      height: body.aabb.height,
      layer: body.layer ?? defaults.layer,
      mask: body.mask ?? defaults.mask,
      mass: body.mass,
      noSelfCollide: body.noSelfCollide,
      gravityScale: body.gravityScale,
    })
  }

  if (entity.controller?.type === 'platformer') {
    addPlatformer(world, eid, entity.controller.tuning)
  }
  if (entity.shooter) addShooter(world, eid, entity.shooter)
  if (entity.asset !== undefined) setSpriteAsset(world, eid, entity.asset)
  if (entity.enterCue !== undefined) world.enterCues.set(eid, entity.enterCue)

  return eid
}

/**
 * Replace the world's current scene with `doc`.
 *
 * @returns authoring id → entity id
 * @throws SceneLifecycleError when called during a tick
 * @throws ConfigurationError listing every problem in the document
 */
export function loadScene(world: GameWorld, doc: SceneDocument): Map<string, number> {
  assertBetweenTicks(world, 'load')

  const problems = validateScene(doc)
  if (problems.length > 0) throw new ConfigurationError('SceneDocument', problems)

  if (world.sceneEntities.size > 0) unloadScene(world)

  const ids = new Map<string, number>()
  for (const entity of doc.entities) {
    const eid = spawnSceneEntity(world, entity)
    world.sceneEntities.add(eid)
    ids.set(entity.id, eid)
  }

  world.log.info({ entities: ids.size }, 'scene loaded')
  return ids
}

/**
 * Despawn every scene entity and return all pooled entities to their pools.
 * @throws SceneLifecycleError when called during a tick
 */
export function unloadScene(world: GameWorld): void {
  assertBetweenTicks(world, 'unload')

  const count = world.sceneEntities.size
  for (const eid of [...world.sceneEntities]) {
    despawnEntity(world, eid)
  }
  world.sceneEntities.clear()

  for (const pool of world.pools) pool.releaseAll()

  world.triggerPairs.clear()
  world.nextTriggerPairs.clear()
  world.contacts.count = 0
  clearSpatialHash(world.spatialHash)

  world.log.info({ entities: count }, 'scene unloaded')
}
