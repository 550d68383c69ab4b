/**
 * Seeded PRNG (mulberry32)
 *
 * Every random choice inside a tick (particle spread, etc.) draws from the
 * world's generator so that two runs with the same seed and inputs match.
 */

export class SeededRng {
  private state: number

  constructor(seed: number) {
    this.state = seed | 0
  }

  /** Float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  /** Float in [min, max) */
  nextRange(min: number, max: number): number {
    return min + this.next() * (max - min)
  }
}
