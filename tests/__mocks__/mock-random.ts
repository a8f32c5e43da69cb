/**
 * Deterministic dice for tests
 *
 * MockRandomSource hands out a fixed list of raw numbers; ModuloDie maps a raw
 * number n onto (n % 6) + 1, so [5, 3] rolls a 6 and then a 4.
 */

import type { DieDistribution, RandomSource } from '../../core/dice.js';

export class MockRandomSource implements RandomSource {
  private results: number[];

  constructor(results: number[]) {
    this.results = [...results];
  }

  nextInt(): number {
    const value = this.results.shift();
    if (value === undefined) {
      throw new Error('MockRandomSource ran out of numbers');
    }
    return value;
  }

  get remaining(): number {
    return this.results.length;
  }
}

export class ModuloDie implements DieDistribution {
  sample(rng: RandomSource): number {
    return (rng.nextInt() % 6) + 1;
  }
}
