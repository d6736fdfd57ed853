// ─────────────────────────────────────────────────────────────────────────────
// Seeded Random - Deterministic shuffles and random variable operations
// ─────────────────────────────────────────────────────────────────────────────

export class SeededRandom {
  private seed: number

  constructor(seed: number = Date.now()) {
    this.seed = seed & 0x7fffffff
  }

  /** Get next random number in [0, 1) */
  next(): number {
    this.seed = (Math.imul(this.seed, 1103515245) + 12345) & 0x7fffffff
    return this.seed / 0x80000000
  }

  /** Get random integer between min (inclusive) and max (exclusive) */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min
  }

  /** Get random float between min and max */
  float(min: number, max: number): number {
    return this.next() * (max - min) + min
  }

  /** Shuffle array in place */
  shuffle<T>(array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
      const j = this.int(0, i + 1)
      ;[array[i], array[j]] = [array[j], array[i]]
    }
    return array
  }

  getSeed(): number {
    return this.seed
  }

  setSeed(seed: number): void {
    this.seed = seed & 0x7fffffff
  }
}
