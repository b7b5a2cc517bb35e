/**
 * Protocol configuration
 *
 * The oversampling factor and the disclosed fraction are tunables, not
 * protocol constants. Defaults reproduce the classic 4x / 50% setup.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

// ============================================================================
// Configuration Schema
// ============================================================================

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const ProtocolConfigSchema = z.object({
  /** Raw qubits sent per requested key bit */
  oversamplingFactor: z.number().int().min(1).default(4),
  /** Share of the sifted key disclosed for the eavesdropper check */
  checkFraction: z.number().min(0).lt(1).default(0.5),
  /** Upper bound on attempts made by generateKey */
  maxAttempts: z.number().int().min(1).default(5),
  logLevel: LogLevelSchema.default('silent'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ProtocolConfig = z.infer<typeof ProtocolConfigSchema>;
export type ProtocolConfigInput = z.input<typeof ProtocolConfigSchema>;

export const DEFAULT_CONFIG: ProtocolConfig = ProtocolConfigSchema.parse({});

function parseConfig(input: unknown): ProtocolConfig {
  const result = ProtocolConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
  return result.data;
}

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: ProtocolConfigInput = {}): ProtocolConfig {
  return parseConfig(input);
}

function numberFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Read configuration from BB84_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ProtocolConfig {
  return parseConfig({
    oversamplingFactor: numberFromEnv(env.BB84_OVERSAMPLING_FACTOR),
    checkFraction: numberFromEnv(env.BB84_CHECK_FRACTION),
    maxAttempts: numberFromEnv(env.BB84_MAX_ATTEMPTS),
    logLevel: env.BB84_LOG_LEVEL || undefined,
  });
}
