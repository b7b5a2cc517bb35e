/**
 * Error types for the BB84 simulator and cipher.
 *
 * Key-generation failures are returned inside result values; cipher and
 * configuration failures are thrown.
 */

export type QkdErrorCode =
  | 'EAVESDROPPER_DETECTED'
  | 'INSUFFICIENT_SIFTED_BITS'
  | 'OUT_OF_RANGE_CHARACTER'
  | 'INVALID_KEY'
  | 'CONFIGURATION_ERROR'
  | 'PROTOCOL_ERROR';

export class QkdError extends Error {
  public readonly code: QkdErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: QkdErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'QkdError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Disclosed sifted bits disagreed between the two parties.
 */
export class EavesdropperDetectedError extends QkdError {
  public readonly mismatches: number;

  constructor(mismatches: number, compared: number) {
    super('There was an eavesdropper!', 'EAVESDROPPER_DETECTED', { mismatches, compared });
    this.name = 'EavesdropperDetectedError';
    this.mismatches = mismatches;
  }
}

export class InsufficientSiftedBitsError extends QkdError {
  public readonly required: number;
  public readonly actual: number;

  constructor(required: number, actual: number, context?: Record<string, unknown>) {
    super(
      `Final key has ${actual} bits, at least ${required} required`,
      'INSUFFICIENT_SIFTED_BITS',
      { required, actual, ...context }
    );
    this.name = 'InsufficientSiftedBitsError';
    this.required = required;
    this.actual = actual;
  }
}

export class OutOfRangeCharacterError extends QkdError {
  public readonly codePoint: number;
  public readonly index: number;

  constructor(codePoint: number, index: number) {
    super(
      `Character U+${codePoint.toString(16).toUpperCase().padStart(4, '0')} at index ${index} is outside the 8-bit range`,
      'OUT_OF_RANGE_CHARACTER',
      { codePoint, index }
    );
    this.name = 'OutOfRangeCharacterError';
    this.codePoint = codePoint;
    this.index = index;
  }
}

export class InvalidKeyError extends QkdError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_KEY', context);
    this.name = 'InvalidKeyError';
  }
}

export class ConfigurationError extends QkdError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

export class ProtocolError extends QkdError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', context);
    this.name = 'ProtocolError';
  }
}

export function isQkdError(error: unknown): error is QkdError {
  return error instanceof QkdError;
}
