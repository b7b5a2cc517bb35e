/**
 * Tests for KeyGenerator
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import type { QuantumChannel } from '../channel';
import { ConfigurationError, EavesdropperDetectedError, InsufficientSiftedBitsError } from '../errors';
import { KeyGenerator } from '../key-generator';
import { bitsToString, createQubit } from '../qubit';
import { mathRandom, seededRandom } from '../random';

/** Flips every bit in flight, so any matched basis disagrees */
const flippingChannel: QuantumChannel = {
  name: 'flipping',
  transmit: (qubits) => qubits.map((q) => createQubit(q.basis, q.bit === 0 ? 1 : 0)),
};

function captureLogger(): { logger: pino.Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (msg: string) => {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    }
  );
  return { logger, lines };
}

describe('KeyGenerator Creation', () => {
  it('uses the 4x / 50% defaults', () => {
    const generator = new KeyGenerator();
    expect(generator.oversamplingFactor).toBe(4);
    expect(generator.checkFraction).toBe(0.5);
    expect(generator.stage).toBe('init');
  });

  it('derives num_bits from the oversampling factor', () => {
    expect(new KeyGenerator().numBitsFor(10)).toBe(40);
    expect(new KeyGenerator({ oversamplingFactor: 6 }).numBitsFor(10)).toBe(60);
  });

  it('rejects invalid configuration', () => {
    expect(() => new KeyGenerator({ oversamplingFactor: 0 })).toThrow(ConfigurationError);
    expect(() => new KeyGenerator({ checkFraction: 1.5 })).toThrow(ConfigurationError);
  });

  it('rejects non-positive or fractional key lengths', () => {
    const generator = new KeyGenerator();
    expect(() => generator.generate(0)).toThrow('minKeyLength must be a positive integer, got 0');
    expect(() => generator.generate(1.5)).toThrow(ConfigurationError);
  });
});

describe('generate', () => {
  it('returns a binary key shorter than num_bits for minKeyLength 10', () => {
    const result = new KeyGenerator({ rng: seededRandom(10) }).generate(10);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.key).toMatch(/^[01]*$/);
      expect(result.key.length).toBeLessThan(40);
      expect(result.transcript.numBits).toBe(40);
    }
  });

  it('returns the undisclosed suffix of the sender sifted key', () => {
    const result = new KeyGenerator({ rng: seededRandom(31) }).generate(16);
    expect(result.ok).toBe(true);
    if (result.ok) {
      const { sifted, check } = result.transcript;
      const length = sifted.alice.length;
      expect(check.prefixLength).toBe(Math.floor(length * 0.5));
      expect(result.key).toHaveLength(length - Math.floor(length * 0.5));
      expect(result.key).toBe(bitsToString(sifted.alice.slice(check.prefixLength)));
    }
  });

  it('records every stage in the transcript', () => {
    const generator = new KeyGenerator({ rng: seededRandom(8) });
    const transcript = generator.run(5);
    expect(transcript.numBits).toBe(20);
    expect(transcript.channel).toBe('ideal');
    expect(transcript.alice.rawKey).toHaveLength(20);
    expect(transcript.alice.bases).toHaveLength(20);
    expect(transcript.bob.rawKey).toHaveLength(20);
    expect(transcript.bob.bases).toHaveLength(20);
    expect(transcript.sifted.alice).toEqual(transcript.sifted.bob);
    expect(transcript.stage).toBe('success');
    expect(generator.stage).toBe('success');
  });

  it('is reproducible from a seed', () => {
    const a = new KeyGenerator({ rng: seededRandom(99) }).generate(12);
    const b = new KeyGenerator({ rng: seededRandom(99) }).generate(12);
    expect(a.ok && b.ok && a.key === b.key).toBe(true);
  });

  it('never aborts over the lossless channel', () => {
    const generator = new KeyGenerator({ rng: mathRandom });
    for (let i = 0; i < 50; i++) {
      const result = generator.generate(1 + (i % 8));
      expect(result.ok).toBe(true);
    }
  });

  it('aborts when the disclosed bits disagree', () => {
    const generator = new KeyGenerator({ rng: seededRandom(4), channel: flippingChannel });
    const result = generator.generate(10);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('eavesdropper-detected');
      expect(result.error).toBeInstanceOf(EavesdropperDetectedError);
      expect(result.error.message).toBe('There was an eavesdropper!');
      expect(result.transcript.channel).toBe('flipping');
      expect(result.transcript.stage).toBe('aborted');
      expect(result.error.mismatches).toBe(result.transcript.check.prefixLength);
    }
    expect(generator.stage).toBe('aborted');
  });

  it('logs stages at debug and aborts at warn', () => {
    const { logger, lines } = captureLogger();
    new KeyGenerator({ rng: seededRandom(1), logger }).generate(4);
    expect(lines.map((line) => line.msg)).toEqual([
      'qubits prepared',
      'qubits measured',
      'bases reconciled',
      'key established',
    ]);

    lines.length = 0;
    new KeyGenerator({ rng: seededRandom(2), logger, channel: flippingChannel }).generate(10);
    const warning = lines[lines.length - 1];
    expect(warning.msg).toBe('eavesdropper detected');
    expect(warning.level).toBe(40);
    expect(warning.channel).toBe('flipping');
  });
});

describe('generateKey', () => {
  it('returns a key at least minKeyLength long', () => {
    const generator = new KeyGenerator({ rng: seededRandom(5), oversamplingFactor: 8 });
    const result = generator.generateKey(16);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.key.length).toBeGreaterThanOrEqual(16);
      expect(result.key).toMatch(/^[01]+$/);
      expect(result.attempts).toBeGreaterThanOrEqual(1);
    }
  });

  it('reports insufficient sifted bits once attempts run out', () => {
    const generator = new KeyGenerator({ rng: seededRandom(6) });
    const result = generator.generateKey(2, { requiredLength: 100, maxAttempts: 3 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('insufficient-sifted-bits');
      expect(result.attempts).toBe(3);
      expect(result.error).toBeInstanceOf(InsufficientSiftedBitsError);
      expect(result.error.code).toBe('INSUFFICIENT_SIFTED_BITS');
    }
  });

  it('reports the eavesdropper when every attempt aborts', () => {
    const generator = new KeyGenerator({ rng: seededRandom(7), channel: flippingChannel, maxAttempts: 4 });
    const result = generator.generateKey(10);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('eavesdropper-detected');
      expect(result.attempts).toBe(4);
    }
  });

  it('stops retrying after the deadline', () => {
    let clock = 0;
    const now = (): number => (clock += 1000);
    const generator = new KeyGenerator({ rng: seededRandom(8) });
    const result = generator.generateKey(2, { requiredLength: 100, maxAttempts: 10, deadlineMs: 500, now });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('deadline-exceeded');
      expect(result.attempts).toBe(1);
    }
  });

  it('validates its limits', () => {
    const generator = new KeyGenerator();
    expect(() => generator.generateKey(8, { maxAttempts: 0 })).toThrow('maxAttempts must be a positive integer, got 0');
    expect(() => generator.generateKey(8, { requiredLength: -1 })).toThrow(ConfigurationError);
  });
});
