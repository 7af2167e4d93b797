/**
 * Deterministic random source for strategies that sample formats
 */
export interface RandomSource {
  /**
   * @returns Integer in [0, bound)
   */
  nextInt: (bound: number) => number;
}

/**
 * Mulberry32 generator, seeded once at construction
 * Same seed always produces the same sequence
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6D2B79F5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}
