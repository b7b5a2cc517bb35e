/**
 * Receiver side: independent random bases, one measurement per qubit.
 */

import { measure } from './measurement';
import type { Basis, Bit, QubitState } from './qubit';
import { randomBases, type RandomSource } from './random';

export interface DecodedBits {
  rawKey: Bit[];
  bases: Basis[];
}

export function decode(qubits: readonly QubitState[], rng: RandomSource): DecodedBits {
  const bases = randomBases(qubits.length, rng);
  const rawKey = qubits.map((qubit, i) => measure(qubit, bases[i], rng));
  return { rawKey, bases };
}
