/**
 * Quantum channel between the encoder and the decoder.
 *
 * Only the lossless channel ships here. The interface exists so callers can
 * substitute their own transport, e.g. one that tampers with qubits.
 */

import type { QubitState } from './qubit';

export interface QuantumChannel {
  readonly name: string;
  transmit(qubits: readonly QubitState[]): readonly QubitState[];
}

/**
 * Delivers every qubit unchanged
 */
export const idealChannel: QuantumChannel = {
  name: 'ideal',
  transmit: (qubits) => qubits,
};
