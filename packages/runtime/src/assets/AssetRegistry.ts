/**
 * Asset Registry
 *
 * Tracks asynchronous asset loads by reference and answers the core's
 * resolve(ref) with ready, pending or failed. The first resolve of an unknown
 * reference starts its load; the simulation never waits for one to finish.
 */

import { createLogger, type AssetResolution, type AssetResolver, type Logger } from '@brickyard/core'

/** Loads one asset; rejects when it cannot be produced */
export type AssetLoadFn<H> = (ref: string) => Promise<H>

export interface AssetRegistryOptions {
  /** Timeout for a single load (ms) */
  timeoutMs?: number
  log?: Logger
}

/** Default timeout for asset loading (ms) */
export const ASSET_LOAD_TIMEOUT_MS = 30000

type AssetEntry<H> = {
  resolution: AssetResolution<H>
  /** Settles with the final resolution; never rejects */
  done: Promise<AssetResolution<H>>
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class AssetRegistry<H> implements AssetResolver<H> {
  private readonly entries = new Map<string, AssetEntry<H>>()
  private readonly timeoutMs: number
  private readonly log: Logger

  constructor(
    private readonly load: AssetLoadFn<H>,
    options: AssetRegistryOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? ASSET_LOAD_TIMEOUT_MS
    this.log = options.log ?? createLogger('assets')
  }

  /**
   * Current state of `ref`. Starts the load when the reference is new.
   */
  resolve(ref: string): AssetResolution<H> {
    return this.entry(ref).resolution
  }

  /**
   * Start loading `ref` if needed
   * @returns the final resolution once the load settles
   */
  request(ref: string): Promise<AssetResolution<H>> {
    return this.entry(ref).done
  }

  /**
   * Load several assets up front, e.g. everything a scene references
   * @returns references that failed to load
   */
  async preload(refs: Iterable<string>): Promise<string[]> {
    const unique = [...new Set(refs)]
    const results = await Promise.all(unique.map((ref) => this.request(ref)))
    return unique.filter((_, i) => results[i]?.status === 'failed')
  }

  /** Forget a failed load so the next resolve tries again */
  retry(ref: string): boolean {
    const entry = this.entries.get(ref)
    if (!entry || entry.resolution.status !== 'failed') return false
    this.entries.delete(ref)
    return true
  }

  get size(): number {
    return this.entries.size
  }

  /** Number of references in each state */
  counts(): Record<AssetResolution<H>['status'], number> {
    const counts = { ready: 0, pending: 0, failed: 0 }
    for (const { resolution } of this.entries.values()) counts[resolution.status]++
    return counts
  }

  /** Drop every entry. Loads still in flight settle into nothing. */
  clear(): void {
    this.entries.clear()
  }

  private entry(ref: string): AssetEntry<H> {
    const existing = this.entries.get(ref)
    if (existing) return existing

    const entry: AssetEntry<H> = {
      resolution: { status: 'pending' },
      done: Promise.resolve({ status: 'pending' }),
    }
    this.entries.set(ref, entry)
    entry.done = this.settle(ref, entry)
    return entry
  }

  private async settle(ref: string, entry: AssetEntry<H>): Promise<AssetResolution<H>> {
    let resolution: AssetResolution<H>
    try {
      const handle = await this.loadWithTimeout(ref)
      resolution = { status: 'ready', handle }
      this.log.debug({ ref }, 'asset ready')
    } catch (err) {
      resolution = { status: 'failed', reason: describeError(err) }
      this.log.warn({ ref, err }, 'asset load failed')
    }

    // A cleared or retried entry no longer belongs to this load
    if (this.entries.get(ref) === entry) entry.resolution = resolution
    return resolution
  }

  private async loadWithTimeout(ref: string): Promise<H> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Asset '${ref}' timed out after ${this.timeoutMs / 1000}s`))
      }, this.timeoutMs)
    })

    try {
      return await Promise.race([this.load(ref), timeout])
    } finally {
      clearTimeout(timer)
    }
  }
}
