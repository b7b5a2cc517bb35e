/**
 * Eavesdropper detection
 *
 * The parties disclose a prefix of their sifted keys over the classical
 * channel and compare it bit by bit. Any disagreement aborts the attempt;
 * otherwise the undisclosed suffix of the sender's copy becomes the key.
 */

import { ConfigurationError, EavesdropperDetectedError, ProtocolError } from './errors';
import { bitsToString, type Bit, type BitString } from './qubit';

export const DEFAULT_CHECK_FRACTION = 0.5;

export interface CheckPassed {
  ok: true;
  finalKey: BitString;
  prefixLength: number;
  mismatches: 0;
}

export interface CheckFailed {
  ok: false;
  error: EavesdropperDetectedError;
  prefixLength: number;
  mismatches: number;
}

export type EavesdropperCheckResult = CheckPassed | CheckFailed;

export function disclosedPrefixLength(siftedLength: number, checkFraction: number = DEFAULT_CHECK_FRACTION): number {
  if (!(checkFraction >= 0 && checkFraction < 1)) {
    throw new ConfigurationError(`checkFraction must be in [0, 1), got ${checkFraction}`, { checkFraction });
  }
  return Math.floor(siftedLength * checkFraction);
}

export function checkForEavesdropper(
  siftedAlice: readonly Bit[],
  siftedBob: readonly Bit[],
  checkFraction: number = DEFAULT_CHECK_FRACTION
): EavesdropperCheckResult {
  if (siftedAlice.length !== siftedBob.length) {
    throw new ProtocolError('Sifted keys must have the same length', {
      alice: siftedAlice.length,
      bob: siftedBob.length,
    });
  }

  const prefixLength = disclosedPrefixLength(siftedAlice.length, checkFraction);
  let mismatches = 0;
  for (let i = 0; i < prefixLength; i++) {
    if (siftedAlice[i] !== siftedBob[i]) {
      mismatches++;
    }
  }

  if (mismatches > 0) {
    return {
      ok: false,
      error: new EavesdropperDetectedError(mismatches, prefixLength),
      prefixLength,
      mismatches,
    };
  }

  return {
    ok: true,
    finalKey: bitsToString(siftedAlice.slice(prefixLength)),
    prefixLength,
    mismatches: 0,
  };
}
