/**
 * Source of uniform and normal draws for a single simulation stream.
 *
 * Replaces Math.random() so every run is reproducible from its seed.
 */
export interface RandomSource {
  /** Next uniform draw in [0, 1). */
  next(): number;
  /** Next standard normal draw. */
  nextGaussian(): number;
}

/**
 * Seeded generator built on mulberry32.
 *
 * Each instance owns its own 32-bit state, so independent runs
 * never share a sequence.
 */
export class SeededRandom implements RandomSource {
  readonly seed: number;
  private state: number;
  private spareGaussian: number | null = null;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Box-Muller transform; the second variate of each pair is kept for the next call.
   */
  nextGaussian(): number {
    if (this.spareGaussian !== null) {
      const spare = this.spareGaussian;
      this.spareGaussian = null;
      return spare;
    }

    // 1 - next() lies in (0, 1], keeping log() finite
    const u1 = 1 - this.next();
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;
    this.spareGaussian = radius * Math.sin(theta);
    return radius * Math.cos(theta);
  }

  /**
   * Create an independent stream whose seed is derived from this one.
   */
  fork(salt: number): SeededRandom {
    return new SeededRandom(deriveSeed(this.seed, salt));
  }
}

/**
 * Combine a seed with a salt into a new 32-bit seed.
 */
export function deriveSeed(seed: number, salt: number): number {
  let h = (seed ^ salt) >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
  return (h ^ (h >>> 16)) >>> 0;
}
