/**
 * Sender side: random raw key and bases, one prepared qubit per bit.
 */

import { createQubit, type Basis, type Bit, type QubitState } from './qubit';
import { randomBases, randomBits, type RandomSource } from './random';

export interface EncodedQubits {
  rawKey: Bit[];
  bases: Basis[];
  qubits: QubitState[];
}

export function encode(numBits: number, rng: RandomSource): EncodedQubits {
  if (!Number.isInteger(numBits) || numBits < 0) {
    throw new Error(`numBits must be a non-negative integer, got ${numBits}`);
  }
  const rawKey = randomBits(numBits, rng);
  const bases = randomBases(numBits, rng);
  const qubits = rawKey.map((bit, i) => createQubit(bases[i], bit));
  return { rawKey, bases, qubits };
}
