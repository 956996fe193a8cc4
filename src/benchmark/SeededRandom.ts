/**
 * Seeded pseudorandom generator (mulberry32).
 *
 * Deterministic for a given seed so repeated runs draw the same inputs.
 * Seeds are reduced to 32 bits.
 */
export class SeededRandom {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0
  }

  /**
   * Next float in [0, 1)
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0
    let t = this.state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  /**
   * Uniform integer in [min, max], both inclusive
   */
  randint(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`Invalid integer range [${min}, ${max}]`)
    }
    return min + Math.floor(this.next() * (max - min + 1))
  }

  /**
   * Array of `length` uniform integers in [min, max]
   */
  integers(length: number, min: number, max: number): number[] {
    const values: number[] = new Array<number>(length)
    for (let i = 0; i < length; i++) {
      values[i] = this.randint(min, max)
    }
    return values
  }
}
