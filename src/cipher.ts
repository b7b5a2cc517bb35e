/**
 * Repeating-key XOR cipher over 8-bit text.
 *
 * Text is turned into 8 bits per character, the key is repeated and then
 * truncated to the same length, and the two are XORed bit by bit. XOR is
 * its own inverse, so decrypt runs the same transform.
 */

import { InvalidKeyError, OutOfRangeCharacterError, ProtocolError } from './errors';
import type { BitString } from './qubit';

const BITS_PER_CHAR = 8;
const MAX_CODE_POINT = 0xff;
const BINARY_PATTERN = /^[01]*$/;

// ============================================================================
// Text <-> Binary
// ============================================================================

/**
 * 8-bit big-endian encoding of each character
 * @throws OutOfRangeCharacterError for code points above 255
 */
export function textToBinary(text: string): BitString {
  let bits = '';
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > MAX_CODE_POINT) {
      throw new OutOfRangeCharacterError(text.codePointAt(i) ?? code, i);
    }
    bits += code.toString(2).padStart(BITS_PER_CHAR, '0');
  }
  return bits;
}

export function binaryToText(bits: BitString): string {
  if (!BINARY_PATTERN.test(bits) || bits.length % BITS_PER_CHAR !== 0) {
    throw new ProtocolError(`Expected a binary string with a multiple of ${BITS_PER_CHAR} digits`, {
      length: bits.length,
    });
  }
  let text = '';
  for (let i = 0; i < bits.length; i += BITS_PER_CHAR) {
    text += String.fromCharCode(parseInt(bits.slice(i, i + BITS_PER_CHAR), 2));
  }
  return text;
}

// ============================================================================
// Key Handling
// ============================================================================

export function validateKey(key: string): void {
  if (key.length === 0) {
    throw new InvalidKeyError('Key must not be empty');
  }
  if (!BINARY_PATTERN.test(key)) {
    throw new InvalidKeyError('Key must contain only 0 and 1', { length: key.length });
  }
}

/**
 * Repeat the key until it covers `length` bits, then cut it there
 */
export function stretchKey(key: BitString, length: number): BitString {
  validateKey(key);
  return key.repeat(Math.ceil(length / key.length)).slice(0, length);
}

export function xorBits(a: BitString, b: BitString): BitString {
  if (a.length !== b.length) {
    throw new ProtocolError('Bit strings must have the same length', { a: a.length, b: b.length });
  }
  let out = '';
  for (let i = 0; i < a.length; i++) {
    out += a[i] === b[i] ? '0' : '1';
  }
  return out;
}

// ============================================================================
// Encrypt / Decrypt
// ============================================================================

export function encrypt(text: string, key: BitString): string {
  validateKey(key);
  const bits = textToBinary(text);
  return binaryToText(xorBits(bits, stretchKey(key, bits.length)));
}

/**
 * Same transform as encrypt; needs the identical key
 */
export function decrypt(text: string, key: BitString): string {
  return encrypt(text, key);
}

// ============================================================================
// Hex Transport
// ============================================================================

/**
 * Ciphertext often contains control characters, so it is printed as hex
 */
export function textToHex(text: string): string {
  const bits = textToBinary(text);
  let hex = '';
  for (let i = 0; i < bits.length; i += BITS_PER_CHAR) {
    hex += parseInt(bits.slice(i, i + BITS_PER_CHAR), 2).toString(16).padStart(2, '0');
  }
  return hex;
}

export function hexToText(hex: string): string {
  const s = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (!/^([0-9a-fA-F]{2})*$/.test(s)) {
    throw new ProtocolError('Expected an even number of hex digits', { length: s.length });
  }
  let text = '';
  for (let i = 0; i < s.length; i += 2) {
    text += String.fromCharCode(parseInt(s.slice(i, i + 2), 16));
  }
  return text;
}
