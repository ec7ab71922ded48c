/**
 * Disturbance Sources
 *
 * Zero-mean Gaussian noise over a pluggable uniform generator, plus a
 * seedable generator for reproducible runs.
 */

import type { NoiseSource } from './types';

/** Uniform generator on [0, 1) */
export type UniformSource = () => number;

/**
 * Create a seedable PRNG (mulberry32)
 */
export function createPRNG(seed: number): UniformSource {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Gaussian noise via the Box-Muller transform
 */
export class GaussianNoise implements NoiseSource {
  private readonly uniform: UniformSource;

  /**
   * @param uniform - Uniform generator (default: Math.random)
   */
  constructor(uniform: UniformSource = Math.random) {
    this.uniform = uniform;
  }

  sample(stdDev: number): number {
    if (stdDev <= 0) {
      return 0;
    }
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - this.uniform();
    const u2 = this.uniform();
    return stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}
