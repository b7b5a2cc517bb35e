/**
 * bb84-qkd
 *
 * BB84 quantum key distribution simulator and a repeating-key XOR cipher
 * that consumes the generated key.
 *
 * @example
 * ```typescript
 * import { KeyGenerator, encrypt, decrypt } from 'bb84-qkd';
 *
 * const generator = new KeyGenerator();
 * const result = generator.generateKey(32);
 * if (result.ok) {
 *   const ciphertext = encrypt('attack at dawn', result.key);
 *   decrypt(ciphertext, result.key);  // 'attack at dawn'
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Key Generation
// ============================================================================

export { KeyGenerator } from './key-generator';
export type {
  KeyGeneratorOptions,
  ProtocolStage,
  ProtocolTranscript,
  KeyGenerationResult,
  KeySuccess,
  KeyAborted,
  GenerateKeyOptions,
  GenerateKeyResult,
  GeneratedKey,
  KeyGenerationFailure,
  KeyFailureReason,
} from './key-generator';

// ============================================================================
// Protocol Stages
// ============================================================================

export { encode } from './encoder';
export type { EncodedQubits } from './encoder';

export { decode } from './decoder';
export type { DecodedBits } from './decoder';

export { measure, outcomeProbabilities, rotateInto } from './measurement';
export type { OutcomeProbabilities } from './measurement';

export { sift } from './sifter';
export type { PartyRecord, SiftedKeys } from './sifter';

export {
  checkForEavesdropper,
  disclosedPrefixLength,
  DEFAULT_CHECK_FRACTION,
} from './eavesdropper-check';
export type { EavesdropperCheckResult, CheckPassed, CheckFailed } from './eavesdropper-check';

export { idealChannel } from './channel';
export type { QuantumChannel } from './channel';

// ============================================================================
// Qubit Model
// ============================================================================

export {
  BASES,
  createQubit,
  isBit,
  isBasis,
  bitsToString,
  hadamard,
  pauliX,
  prepareStateVector,
} from './qubit';
export type { Bit, Basis, BitString, QubitState, StateVector } from './qubit';

export {
  complex,
  magnitudeSquared,
  conjugate,
  add,
  subtract,
  multiply,
  scale,
  equals,
  innerProduct,
  ZERO,
  ONE,
} from './complex';
export type { Complex } from './complex';

// ============================================================================
// Randomness
// ============================================================================

export {
  mathRandom,
  cryptoRandom,
  seededRandom,
  randomBit,
  randomBasis,
  randomBits,
  randomBases,
} from './random';
export type { RandomSource } from './random';

// ============================================================================
// Cipher
// ============================================================================

export {
  encrypt,
  decrypt,
  textToBinary,
  binaryToText,
  stretchKey,
  xorBits,
  validateKey,
  textToHex,
  hexToText,
} from './cipher';

// ============================================================================
// Configuration, Logging, Errors
// ============================================================================

export {
  ProtocolConfigSchema,
  LogLevelSchema,
  DEFAULT_CONFIG,
  resolveConfig,
  configFromEnv,
} from './config';
export type { ProtocolConfig, ProtocolConfigInput, LogLevel } from './config';

export { createLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';

export {
  QkdError,
  EavesdropperDetectedError,
  InsufficientSiftedBitsError,
  OutOfRangeCharacterError,
  InvalidKeyError,
  ConfigurationError,
  ProtocolError,
  isQkdError,
} from './errors';
export type { QkdErrorCode } from './errors';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
