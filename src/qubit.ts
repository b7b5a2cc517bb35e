/**
 * Qubit model
 *
 * A prepared qubit is recorded as the pair (basis, bit). Its state vector
 * is only materialized when it is measured.
 */

import { add, subtract, scale, ONE, ZERO, type Complex } from './complex';

export type Bit = 0 | 1;

/**
 * Z is the rectilinear basis {|0⟩, |1⟩}, X the diagonal basis {|+⟩, |−⟩}
 */
export type Basis = 'Z' | 'X';

/**
 * String of '0' and '1' characters
 */
export type BitString = string;

export interface QubitState {
  readonly basis: Basis;
  readonly bit: Bit;
}

/**
 * Two amplitudes (α, β) of α|0⟩ + β|1⟩
 */
export type StateVector = readonly [Complex, Complex];

export const BASES: readonly Basis[] = ['Z', 'X'];

export function createQubit(basis: Basis, bit: Bit): QubitState {
  return Object.freeze({ basis, bit });
}

export function isBit(value: unknown): value is Bit {
  return value === 0 || value === 1;
}

export function isBasis(value: unknown): value is Basis {
  return value === 'Z' || value === 'X';
}

export function bitsToString(bits: readonly Bit[]): BitString {
  return bits.join('');
}

// =========================================================================
// Gates
// =========================================================================

/**
 * Hadamard: H|0⟩ = |+⟩, H|1⟩ = |−⟩
 */
export function hadamard([a, b]: StateVector): StateVector {
  return [scale(add(a, b), Math.SQRT1_2), scale(subtract(a, b), Math.SQRT1_2)];
}

/**
 * Pauli-X (NOT): X|0⟩ = |1⟩
 */
export function pauliX([a, b]: StateVector): StateVector {
  return [b, a];
}

/**
 * State vector of a prepared qubit: X sets the bit, H rotates into the
 * diagonal basis.
 */
export function prepareStateVector(qubit: QubitState): StateVector {
  let vector: StateVector = [ONE, ZERO];
  if (qubit.bit === 1) {
    vector = pauliX(vector);
  }
  if (qubit.basis === 'X') {
    vector = hadamard(vector);
  }
  return vector;
}
