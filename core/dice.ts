/**
 * Dice - Random Sources and Die Distributions
 *
 * The game only talks to the two interfaces below, so tests can feed a fixed
 * sequence of raw numbers and get predictable rolls.
 */

import { randomInt } from 'crypto';
import { DIE_SIDES } from './types.js';

export interface RandomSource {
  /** Next raw non-negative integer. */
  nextInt(): number;
}

export interface DieDistribution {
  /** A die value between 1 and 6. */
  sample(rng: RandomSource): number;
}

const RAW_RANGE = 2 ** 32;

export class CryptoRandomSource implements RandomSource {
  nextInt(): number {
    return randomInt(0, RAW_RANGE);
  }
}

/**
 * Uniform six-sided die. Raw values above the largest multiple of six below
 * 2^32 are redrawn so every face has the same weight.
 */
export class UniformDie implements DieDistribution {
  private readonly limit = RAW_RANGE - (RAW_RANGE % DIE_SIDES);

  sample(rng: RandomSource): number {
    let raw = rng.nextInt();
    while (raw >= this.limit) {
      raw = rng.nextInt();
    }
    return (raw % DIE_SIDES) + 1;
  }
}

export function pickIndex(count: number): number {
  return randomInt(0, count);
}
