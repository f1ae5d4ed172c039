/**
 * Random number sources.
 *
 * The cache and the generators never call Math.random directly; they take a
 * RandomNumberGenerator so tests can pin the picks.
 */

import { invalidArgument } from '../errors.js';

export interface RandomNumberGenerator {
  /** Uniform integer in the half-open interval [min, max) */
  nextInt(min: number, max: number): number;
}

function checkRange(min: number, max: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw invalidArgument('range', 'bounds must be integers');
  }
  if (max <= min) {
    throw invalidArgument('max', 'must be greater than min');
  }
}

export const mathRandom: RandomNumberGenerator = {
  nextInt(min: number, max: number): number {
    checkRange(min, max);
    return min + Math.floor(Math.random() * (max - min));
  },
};

/**
 * Deterministic generator (mulberry32) for reproducible runs
 */
export function seededRandom(seed: number): RandomNumberGenerator {
  let state = seed >>> 0;

  return {
    nextInt(min: number, max: number): number {
      checkRange(min, max);
      state = (state + 0x6d2b79f5) | 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      const fraction = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
      return min + Math.floor(fraction * (max - min));
    },
  };
}

// ============================================================================
// Possibility
// ============================================================================

/**
 * Decides between downloading a fresh quote and serving a cached one.
 *
 * `determine()` is true when a roll in [1, upperLimit] lands above `step`,
 * so the default 100/50 bound gives even odds.
 */
export class Possibility {
  private _upperLimit = 100;
  private _step = 50;

  constructor(
    readonly random: RandomNumberGenerator = mathRandom,
    upperLimit?: number,
    step?: number
  ) {
    if (upperLimit !== undefined) {
      this.bound(upperLimit, step);
    }
  }

  get upperLimit(): number {
    return this._upperLimit;
  }

  get step(): number {
    return this._step;
  }

  /**
   * Set the roll range; `step` defaults to half of `upperLimit` (1 when the limit is 1)
   */
  bound(upperLimit: number, step?: number): void {
    if (!Number.isInteger(upperLimit) || upperLimit < 1) {
      throw invalidArgument('upperLimit', 'must be an integer greater than 0');
    }

    const resolvedStep = step ?? (upperLimit === 1 ? 1 : Math.floor(upperLimit / 2));

    if (!Number.isInteger(resolvedStep) || resolvedStep < 1) {
      throw invalidArgument('step', 'must be an integer greater than 0');
    }
    if (upperLimit < resolvedStep) {
      throw invalidArgument('upperLimit', 'must be greater than or equal to step');
    }

    this._upperLimit = upperLimit;
    this._step = resolvedStep;
  }

  determine(): boolean {
    return this.random.nextInt(1, this._upperLimit + 1) > this._step;
  }

  reset(): void {
    this._upperLimit = 100;
    this._step = 50;
  }
}
