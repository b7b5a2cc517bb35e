/**
 * Randomness sources.
 *
 * Every stage that draws random values takes a RandomSource argument, so a
 * whole protocol run can be replayed from a seed.
 */

import { getRandomValues } from 'node:crypto';
import type { Basis, Bit } from './qubit';

/**
 * Uniform float in [0, 1)
 */
export type RandomSource = () => number;

const UINT32_RANGE = 0x100000000;

/**
 * Ambient Math.random
 */
export const mathRandom: RandomSource = () => Math.random();

/**
 * Backed by the platform CSPRNG
 */
export const cryptoRandom: RandomSource = () => {
  const word = getRandomValues(new Uint32Array(1))[0];
  return word / UINT32_RANGE;
};

/**
 * Deterministic generator (mulberry32) for reproducible runs.
 *
 * @example
 * ```typescript
 * const rng = seededRandom(42);
 * rng(); // same sequence on every run
 * ```
 */
export function seededRandom(seed: number): RandomSource {
  if (!Number.isFinite(seed)) {
    throw new Error(`Seed must be a finite number, got ${seed}`);
  }
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

export function randomBit(rng: RandomSource): Bit {
  return rng() < 0.5 ? 0 : 1;
}

export function randomBasis(rng: RandomSource): Basis {
  return rng() < 0.5 ? 'Z' : 'X';
}

export function randomBits(length: number, rng: RandomSource): Bit[] {
  return Array.from({ length }, () => randomBit(rng));
}

export function randomBases(length: number, rng: RandomSource): Basis[] {
  return Array.from({ length }, () => randomBasis(rng));
}
