/**
 * KeyGenerator
 *
 * Drives one BB84 exchange end to end:
 *
 *   init → encoded → measured → sifted → checked → success | aborted
 *
 * Every run draws fresh randomness and shares no state with earlier runs,
 * so a caller recovers from an abort by simply generating again.
 *
 * @example
 * ```typescript
 * const generator = new KeyGenerator({ rng: seededRandom(7) });
 * const result = generator.generate(16);
 * if (result.ok) {
 *   const ciphertext = encrypt('hello', result.key);
 * }
 * ```
 */

import { idealChannel, type QuantumChannel } from './channel';
import { resolveConfig, type ProtocolConfig, type ProtocolConfigInput } from './config';
import { decode, type DecodedBits } from './decoder';
import { checkForEavesdropper, type EavesdropperCheckResult } from './eavesdropper-check';
import { encode, type EncodedQubits } from './encoder';
import {
  ConfigurationError,
  EavesdropperDetectedError,
  InsufficientSiftedBitsError,
} from './errors';
import { createLogger, type Logger } from './logger';
import type { BitString } from './qubit';
import { cryptoRandom, type RandomSource } from './random';
import { sift, type SiftedKeys } from './sifter';

// ============================================================================
// Types
// ============================================================================

export type ProtocolStage =
  | 'init'
  | 'encoded'
  | 'measured'
  | 'sifted'
  | 'checked'
  | 'success'
  | 'aborted';

export interface KeyGeneratorOptions extends ProtocolConfigInput {
  /** Randomness for both parties (default: platform CSPRNG) */
  rng?: RandomSource;
  /** Transport between encoder and decoder (default: lossless) */
  channel?: QuantumChannel;
  logger?: Logger;
}

/**
 * Everything exchanged during one run
 */
export interface ProtocolTranscript {
  minKeyLength: number;
  numBits: number;
  channel: string;
  alice: EncodedQubits;
  bob: DecodedBits;
  sifted: SiftedKeys;
  check: EavesdropperCheckResult;
  stage: 'success' | 'aborted';
}

export interface KeySuccess {
  ok: true;
  key: BitString;
  transcript: ProtocolTranscript;
}

export interface KeyAborted {
  ok: false;
  reason: 'eavesdropper-detected';
  error: EavesdropperDetectedError;
  transcript: ProtocolTranscript;
}

export type KeyGenerationResult = KeySuccess | KeyAborted;

export interface GenerateKeyOptions {
  /** Minimum acceptable key length (default: minKeyLength) */
  requiredLength?: number;
  /** Overrides the configured maxAttempts */
  maxAttempts?: number;
  /** Stop retrying once this many milliseconds have elapsed */
  deadlineMs?: number;
  /** Clock used for the deadline */
  now?: () => number;
}

export type KeyFailureReason = 'eavesdropper-detected' | 'insufficient-sifted-bits' | 'deadline-exceeded';

export interface GeneratedKey {
  ok: true;
  key: BitString;
  attempts: number;
}

export interface KeyGenerationFailure {
  ok: false;
  reason: KeyFailureReason;
  error: EavesdropperDetectedError | InsufficientSiftedBitsError;
  attempts: number;
}

export type GenerateKeyResult = GeneratedKey | KeyGenerationFailure;

// ============================================================================
// KeyGenerator Class
// ============================================================================

export class KeyGenerator {
  private readonly config: ProtocolConfig;
  private readonly rng: RandomSource;
  private readonly channel: QuantumChannel;
  private readonly logger: Logger;
  private _stage: ProtocolStage = 'init';

  constructor(options: KeyGeneratorOptions = {}) {
    const { rng, channel, logger, ...config } = options;
    this.config = resolveConfig(config);
    this.rng = rng ?? cryptoRandom;
    this.channel = channel ?? idealChannel;
    this.logger = logger ?? createLogger({ level: this.config.logLevel });
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Stage reached by the most recent run
   */
  get stage(): ProtocolStage {
    return this._stage;
  }

  get oversamplingFactor(): number {
    return this.config.oversamplingFactor;
  }

  get checkFraction(): number {
    return this.config.checkFraction;
  }

  /**
   * Raw qubits sent for a requested key length
   */
  numBitsFor(minKeyLength: number): number {
    this.validateLength(minKeyLength, 'minKeyLength');
    return minKeyLength * this.config.oversamplingFactor;
  }

  // =========================================================================
  // Protocol
  // =========================================================================

  /**
   * Run one exchange and return the full transcript
   */
  run(minKeyLength: number): ProtocolTranscript {
    const numBits = this.numBitsFor(minKeyLength);
    this._stage = 'init';
    const log = this.logger.child({ minKeyLength, numBits, channel: this.channel.name });

    const alice = encode(numBits, this.rng);
    this._stage = 'encoded';
    log.debug('qubits prepared');

    const received = this.channel.transmit(alice.qubits);
    const bob = decode(received, this.rng);
    this._stage = 'measured';
    log.debug('qubits measured');

    const sifted = sift(alice, bob);
    this._stage = 'sifted';
    log.debug({ siftedLength: sifted.alice.length }, 'bases reconciled');

    const check = checkForEavesdropper(sifted.alice, sifted.bob, this.config.checkFraction);
    this._stage = 'checked';

    const stage = check.ok ? 'success' : 'aborted';
    if (check.ok) {
      log.debug({ prefixLength: check.prefixLength, keyLength: check.finalKey.length }, 'key established');
    } else {
      log.warn({ prefixLength: check.prefixLength, mismatches: check.mismatches }, 'eavesdropper detected');
    }
    this._stage = stage;

    return {
      minKeyLength,
      numBits,
      channel: this.channel.name,
      alice,
      bob,
      sifted,
      check,
      stage,
    };
  }

  /**
   * One attempt, no retries. The key length is random and may be shorter
   * than minKeyLength, or empty.
   */
  generate(minKeyLength: number): KeyGenerationResult {
    const transcript = this.run(minKeyLength);
    const { check } = transcript;
    if (!check.ok) {
      return { ok: false, reason: 'eavesdropper-detected', error: check.error, transcript };
    }
    return { ok: true, key: check.finalKey, transcript };
  }

  /**
   * Retry generate() until the key is long enough or attempts run out
   */
  generateKey(minKeyLength: number, options: GenerateKeyOptions = {}): GenerateKeyResult {
    const requiredLength = options.requiredLength ?? minKeyLength;
    const maxAttempts = options.maxAttempts ?? this.config.maxAttempts;
    this.validateLength(minKeyLength, 'minKeyLength');
    this.validateLength(requiredLength, 'requiredLength');
    this.validateLength(maxAttempts, 'maxAttempts');

    const now = options.now ?? Date.now;
    const startedAt = now();
    let longest = 0;
    let lastAbort: EavesdropperDetectedError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1 && options.deadlineMs !== undefined && now() - startedAt >= options.deadlineMs) {
        return {
          ok: false,
          reason: 'deadline-exceeded',
          error: new InsufficientSiftedBitsError(requiredLength, longest, { deadlineMs: options.deadlineMs }),
          attempts: attempt - 1,
        };
      }

      const result = this.generate(minKeyLength);
      if (!result.ok) {
        lastAbort = result.error;
        continue;
      }
      lastAbort = null;
      if (result.key.length >= requiredLength) {
        return { ok: true, key: result.key, attempts: attempt };
      }
      longest = Math.max(longest, result.key.length);
      this.logger.debug({ attempt, keyLength: result.key.length, requiredLength }, 'key too short, retrying');
    }

    if (lastAbort) {
      return { ok: false, reason: 'eavesdropper-detected', error: lastAbort, attempts: maxAttempts };
    }
    return {
      ok: false,
      reason: 'insufficient-sifted-bits',
      error: new InsufficientSiftedBitsError(requiredLength, longest, { attempts: maxAttempts }),
      attempts: maxAttempts,
    };
  }

  // =========================================================================
  // Internal Helpers
  // =========================================================================

  private validateLength(value: number, name: string): void {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, { [name]: value });
    }
  }
}
