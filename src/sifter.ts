/**
 * Basis reconciliation ("sifting").
 *
 * Both parties publish their bases and keep only the positions where the
 * bases agree. Surviving positions stay in ascending order.
 */

import { ProtocolError } from './errors';
import type { Basis, Bit } from './qubit';

export interface PartyRecord {
  rawKey: readonly Bit[];
  bases: readonly Basis[];
}

export interface SiftedKeys {
  alice: Bit[];
  bob: Bit[];
  /** Original indices of the kept positions */
  positions: number[];
}

export function sift(alice: PartyRecord, bob: PartyRecord): SiftedKeys {
  const length = alice.rawKey.length;
  if (alice.bases.length !== length || bob.rawKey.length !== length || bob.bases.length !== length) {
    throw new ProtocolError('Raw keys and bases must all have the same length', {
      aliceBits: alice.rawKey.length,
      aliceBases: alice.bases.length,
      bobBits: bob.rawKey.length,
      bobBases: bob.bases.length,
    });
  }

  const result: SiftedKeys = { alice: [], bob: [], positions: [] };
  for (let i = 0; i < length; i++) {
    if (alice.bases[i] === bob.bases[i]) {
      result.alice.push(alice.rawKey[i]);
      result.bob.push(bob.rawKey[i]);
      result.positions.push(i);
    }
  }
  return result;
}
