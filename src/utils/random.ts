/**
 * Random Sources
 *
 * Seedable xorshift32 generator with Box-Muller normal draws. Seed 0 means
 * "not reproducible" everywhere in the engine and maps to the process-wide
 * generator; any other seed gets its own dedicated stream.
 *
 * @module utils/random
 */

/**
 * Source of uniform and normal deviates
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  nextFloat(): number;
  /** Normal deviate with the given mean and standard deviation */
  normal(mean: number, sd: number): number;
}

/**
 * xorshift32 pseudo-random generator
 */
export class Xorshift32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = (seed >>> 0) || 1;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    // 2^32, so 1.0 is never returned
    return this.next() / 4294967296;
  }

  normal(mean: number, sd: number): number {
    const u1 = Math.max(1e-12, this.nextFloat());
    const u2 = Math.max(1e-12, this.nextFloat());
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + sd * z;
  }
}

const processRandom: RandomSource = new Xorshift32(Math.floor(Math.random() * 4294967296));

/**
 * Resolve the generator for a seed: 0 → process-wide, otherwise a fresh seeded stream
 */
export function randomForSeed(seed: number): RandomSource {
  return seed === 0 ? processRandom : new Xorshift32(seed);
}
