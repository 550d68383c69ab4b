import { afterEach, describe, expect, test, vi } from 'vitest'
import { AssetRegistry, ASSET_LOAD_TIMEOUT_MS } from './AssetRegistry'

interface FakeTexture {
  src: string
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  let reject: (reason: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

describe('AssetRegistry', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  test('an unknown reference is pending until its load finishes', async () => {
    const pending = deferred<FakeTexture>()
    const load = vi.fn(() => pending.promise)
    const registry = new AssetRegistry<FakeTexture>(load)

    expect(registry.resolve('hero')).toEqual({ status: 'pending' })
    expect(registry.resolve('hero')).toEqual({ status: 'pending' })
    expect(load).toHaveBeenCalledTimes(1)

    pending.resolve({ src: 'hero.png' })
    await registry.request('hero')

    expect(registry.resolve('hero')).toEqual({ status: 'ready', handle: { src: 'hero.png' } })
  })

  test('a rejected load is reported as failed with its reason', async () => {
    const registry = new AssetRegistry<FakeTexture>(() => Promise.reject(new Error('404 hero.png')))

    const result = await registry.request('hero')

    expect(result).toEqual({ status: 'failed', reason: '404 hero.png' })
    expect(registry.resolve('hero')).toEqual(result)
  })

  test('a loader that throws synchronously fails the same way', async () => {
    const registry = new AssetRegistry<FakeTexture>(() => {
      throw new Error('bad ref')
    })
    expect(await registry.request('x')).toEqual({ status: 'failed', reason: 'bad ref' })
  })

  test('a load that never finishes times out', async () => {
    vi.useFakeTimers()
    const registry = new AssetRegistry<FakeTexture>(() => new Promise(() => {}))

    const done = registry.request('slow')
    await vi.advanceTimersByTimeAsync(ASSET_LOAD_TIMEOUT_MS)

    expect(await done).toEqual({ status: 'failed', reason: "Asset 'slow' timed out after 30s" })
  })

  test('finished loads leave no timers behind', async () => {
    vi.useFakeTimers()
    const registry = new AssetRegistry<FakeTexture>((ref) => Promise.resolve({ src: ref }))
    await registry.request('a')
    expect(vi.getTimerCount()).toBe(0)
  })

  test('preload returns the references that failed', async () => {
    const registry = new AssetRegistry<FakeTexture>((ref) =>
      ref.startsWith('missing') ? Promise.reject(new Error('not found')) : Promise.resolve({ src: ref })
    )

    const failed = await registry.preload(['a', 'missing/b', 'a', 'c'])

    expect(failed).toEqual(['missing/b'])
    expect(registry.size).toBe(3)
    expect(registry.counts()).toEqual({ ready: 2, pending: 0, failed: 1 })
  })

  test('retry forgets a failure so the next resolve loads again', async () => {
    let attempts = 0
    const registry = new AssetRegistry<FakeTexture>((ref) => {
      attempts++
      return attempts === 1 ? Promise.reject(new Error('flaky')) : Promise.resolve({ src: ref })
    })

    await registry.request('tile')
    expect(registry.retry('tile')).toBe(true)
    expect(registry.resolve('tile').status).toBe('pending')
    expect(await registry.request('tile')).toEqual({ status: 'ready', handle: { src: 'tile' } })
    expect(registry.retry('tile')).toBe(false)
  })

  test('a load that settles after clear does not come back', async () => {
    const pending = deferred<FakeTexture>()
    const registry = new AssetRegistry<FakeTexture>(() => pending.promise)
    const done = registry.request('hero')
    registry.clear()

    pending.resolve({ src: 'hero.png' })
    await done

    expect(registry.size).toBe(0)
  })
})
