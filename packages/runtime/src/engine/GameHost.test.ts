import { describe, expect, test, vi } from 'vitest'
import {
  Button,
  createInputState,
  createSimulation,
  setSpriteAsset,
  spawnDynamicBody,
  spawnStaticBody,
  type Simulation,
} from '@brickyard/core'
import { GameHost, type HostFrame } from './GameHost'
import { InputLatch } from './InputLatch'
import { ManualScheduler } from './FrameScheduler'
import { AssetRegistry } from '../assets/AssetRegistry'

interface FakeTexture {
  src: string
}

function simulation(): Simulation {
  return createSimulation({ config: { tickRate: 50 }, pools: { projectiles: 0, particles: 0 } })
}

function host(sim: Simulation, input = new InputLatch(), assets = new AssetRegistry<FakeTexture>((ref) => Promise.resolve({ src: ref }))) {
  const frames: HostFrame<FakeTexture>[] = []
  const gameHost = new GameHost(sim, {
    input,
    assets,
    render: (frame) => frames.push(frame),
    loop: { scheduler: new ManualScheduler(), now: () => 0 },
  })
  return { gameHost, frames }
}

describe('GameHost', () => {
  test('publishes one frame per advance with the tick and interpolation alpha', () => {
    const sim = simulation()
    const { gameHost, frames } = host(sim)

    expect(gameHost.advance(50)).toBe(2)

    expect(frames).toHaveLength(1)
    expect(frames[0]?.tick).toBe(2)
    expect(frames[0]?.alpha).toBe(0.5)
    expect(sim.world.tick).toBe(2)
  })

  test('samples input at most once per frame, on its first tick', () => {
    const sim = simulation()
    const source = { sample: vi.fn(() => createInputState()) }
    const counting = new GameHost(sim, {
      input: source,
      assets: new AssetRegistry<FakeTexture>((ref) => Promise.resolve({ src: ref })),
      render: () => {},
      loop: { scheduler: new ManualScheduler() },
    })

    counting.advance(10)
    expect(source.sample).toHaveBeenCalledTimes(0)
    counting.advance(50)
    expect(source.sample).toHaveBeenCalledTimes(1)
    expect(sim.world.tick).toBe(3)
  })

  test('a tap during a frame without ticks reaches the next tick', () => {
    const sim = simulation()
    const latch = new InputLatch()
    const { gameHost } = host(sim, latch)
    let sawJump = false
    sim.systems.register((world) => {
      if ((world.input.buttons & Button.JUMP) !== 0) sawJump = true
    })

    latch.press(Button.JUMP)
    latch.release(Button.JUMP)
    gameHost.advance(10)
    expect(sawJump).toBe(false)

    gameHost.advance(10)
    expect(sawJump).toBe(true)
  })

  test('entities wait for their asset without holding up the frame', async () => {
    const sim = simulation()
    let finish: (texture: FakeTexture) => void = () => {}
    const assets = new AssetRegistry<FakeTexture>(
      () =>
        new Promise((resolve) => {
          finish = resolve
        })
    )
    const { gameHost, frames } = host(sim, new InputLatch(), assets)
    const floor = spawnStaticBody(sim.world, 0, 100, 200, 16)
    const hero = spawnDynamicBody(sim.world, 0, 0, { width: 16, height: 16 })
    setSpriteAsset(sim.world, hero, 'hero')

    gameHost.advance(20)
    expect(frames[0]?.items.map((item) => item.eid)).toEqual([floor])

    finish({ src: 'hero.png' })
    await assets.request('hero')

    gameHost.advance(20)
    const item = frames[1]?.items.find((i) => i.eid === hero)
    expect(item?.handle).toEqual({ src: 'hero.png' })
    expect(sim.world.tick).toBe(2)
  })

  test('events are cleared at the start of each frame', () => {
    const sim = simulation()
    const { gameHost, frames } = host(sim)
    sim.world.frame.audio.push({ eid: 0, cue: 'stale' })

    gameHost.advance(20)

    expect(frames[0]?.events.audio).toEqual([])
  })
})
