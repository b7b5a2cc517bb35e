/**
 * Projective measurement of a prepared qubit.
 *
 * The state vector is rotated into the measurement basis and collapsed
 * with the Born rule. Measuring in the preparation basis always returns the
 * encoded bit; measuring in the other basis is a fair coin.
 */

import { magnitudeSquared } from './complex';
import { hadamard, prepareStateVector, type Basis, type Bit, type QubitState, type StateVector } from './qubit';
import type { RandomSource } from './random';

/**
 * Probabilities of reading 0 and 1
 */
export type OutcomeProbabilities = readonly [number, number];

/**
 * Express a state vector in the computational frame of `basis`.
 * H is self-inverse, so it also maps |+⟩, |−⟩ back onto |0⟩, |1⟩.
 */
export function rotateInto(vector: StateVector, basis: Basis): StateVector {
  return basis === 'X' ? hadamard(vector) : vector;
}

/**
 * Outcome distribution for measuring `qubit` in `basis` (non-destructive)
 */
export function outcomeProbabilities(qubit: QubitState, basis: Basis): OutcomeProbabilities {
  const [a, b] = rotateInto(prepareStateVector(qubit), basis);
  const p0 = magnitudeSquared(a);
  const p1 = magnitudeSquared(b);
  const total = p0 + p1;
  return [p0 / total, p1 / total];
}

/**
 * Measure a qubit in the given basis
 * @returns 0 or 1
 */
export function measure(qubit: QubitState, basis: Basis, rng: RandomSource): Bit {
  const [p0] = outcomeProbabilities(qubit, basis);
  // p0 is exactly 1 or 0 on a basis match, and rng() lies in [0, 1)
  return rng() < p0 ? 0 : 1;
}
