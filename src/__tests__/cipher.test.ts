/**
 * Tests for the repeating-key XOR cipher
 */

import { describe, it, expect } from 'vitest';
import {
  binaryToText,
  decrypt,
  encrypt,
  hexToText,
  stretchKey,
  textToBinary,
  textToHex,
  xorBits,
} from '../cipher';
import { InvalidKeyError, OutOfRangeCharacterError, ProtocolError } from '../errors';
import { KeyGenerator } from '../key-generator';
import { seededRandom } from '../random';

describe('Text <-> Binary', () => {
  it('encodes 8 bits per character', () => {
    expect(textToBinary('HI')).toBe('0100100001001001');
    expect(textToBinary('\u0000ÿ')).toBe('0000000011111111');
    expect(textToBinary('')).toBe('');
  });

  it('decodes every 8 bits back into a character', () => {
    expect(binaryToText('0100100001001001')).toBe('HI');
  });

  it('rejects malformed binary', () => {
    expect(() => binaryToText('0101')).toThrow(ProtocolError);
    expect(() => binaryToText('0100100x')).toThrow(ProtocolError);
  });

  it('fails fast on characters above 255', () => {
    let caught: unknown;
    try {
      textToBinary('héllo€');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(OutOfRangeCharacterError);
    if (caught instanceof OutOfRangeCharacterError) {
      expect(caught.codePoint).toBe(0x20ac);
      expect(caught.index).toBe(5);
      expect(caught.code).toBe('OUT_OF_RANGE_CHARACTER');
      expect(caught.message).toBe('Character U+20AC at index 5 is outside the 8-bit range');
    }
  });
});

describe('Key handling', () => {
  it('repeats then truncates the key', () => {
    expect(stretchKey('1010', 16)).toBe('1010101010101010');
    expect(stretchKey('101', 7)).toBe('1011011');
    expect(stretchKey('110011', 4)).toBe('1100');
    expect(stretchKey('1', 0)).toBe('');
  });

  it('XORs bit by bit', () => {
    expect(xorBits('1100', '1010')).toBe('0110');
    expect(() => xorBits('1', '10')).toThrow(ProtocolError);
  });

  it('rejects empty or non-binary keys', () => {
    expect(() => encrypt('HI', '')).toThrow(InvalidKeyError);
    expect(() => encrypt('HI', '10a1')).toThrow('Key must contain only 0 and 1');
  });
});

describe('encrypt / decrypt', () => {
  it('encrypts "HI" with key 1010', () => {
    // 01001000 ^ 10101010 = 11100010, 01001001 ^ 10101010 = 11100011
    const ciphertext = encrypt('HI', '1010');
    expect(ciphertext).toBe('âã');
    expect(textToHex(ciphertext)).toBe('e2e3');
    expect(decrypt(ciphertext, '1010')).toBe('HI');
  });

  it('round-trips every 8-bit character', () => {
    const text = Array.from({ length: 256 }, (_, i) => String.fromCharCode(i)).join('');
    for (const key of ['1', '0', '1101001', '10011100101011110000']) {
      expect(decrypt(encrypt(text, key), key)).toBe(text);
    }
  });

  it('leaves empty text empty', () => {
    expect(encrypt('', '1')).toBe('');
  });

  it('does not recover the text with a different key', () => {
    const samples: Array<[string, string, string]> = [
      ['HI', '1010', '0110'],
      ['attack at dawn', '110100111', '110100110'],
      ['Quantum', '1', '0'],
    ];
    for (const [text, key1, key2] of samples) {
      expect(decrypt(encrypt(text, key1), key2)).not.toBe(text);
    }
  });

  it('round-trips with a generated key', () => {
    const result = new KeyGenerator({ rng: seededRandom(20), oversamplingFactor: 8 }).generateKey(16);
    expect(result.ok).toBe(true);
    if (result.ok) {
      const text = 'Meet at the café at noon.';
      expect(decrypt(encrypt(text, result.key), result.key)).toBe(text);
    }
  });
});

describe('Hex transport', () => {
  it('parses hex with or without prefix', () => {
    expect(hexToText('e2e3')).toBe('âã');
    expect(hexToText('0x4849')).toBe('HI');
  });

  it('rejects odd-length or non-hex input', () => {
    expect(() => hexToText('abc')).toThrow(ProtocolError);
    expect(() => hexToText('zz')).toThrow(ProtocolError);
  });
});
