/**
 * bb84 CLI
 *
 * Usage:
 *   bb84 keygen <length> [--seed n] [--attempts n] [--trace] [--json]
 *   bb84 encrypt <text> --key <bits>
 *   bb84 decrypt <hex> --key <bits>
 *   bb84 demo <text> [--length n] [--seed n] [--attempts n]
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { decrypt, encrypt, hexToText, textToHex } from '../cipher';
import { configFromEnv } from '../config';
import { isQkdError } from '../errors';
import { KeyGenerator, type ProtocolTranscript } from '../key-generator';
import { createLogger } from '../logger';
import { bitsToString } from '../qubit';
import { cryptoRandom, seededRandom, type RandomSource } from '../random';
import { VERSION } from '../index';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  fail: (exitCode: number) => void;
}

interface GlobalOptions {
  verbose?: boolean;
}

interface KeygenOptions {
  seed?: number;
  attempts?: number;
  trace?: boolean;
  json?: boolean;
}

interface KeyOptions {
  key: string;
}

interface DemoOptions {
  seed?: number;
  attempts?: number;
  length: number;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  fail: (exitCode) => {
    process.exitCode = exitCode;
  },
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseSeed(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Expected an integer seed.');
  }
  return n;
}

/**
 * Column-aligned dump of one protocol run
 */
export function formatTranscript(transcript: ProtocolTranscript): string[] {
  const { alice, bob, sifted, check } = transcript;
  const matches = alice.bases.map((basis, i) => (basis === bob.bases[i] ? '|' : ' ')).join('');
  const siftedAlice = bitsToString(sifted.alice);
  const rows: Array<[string, string]> = [
    ['alice bits', bitsToString(alice.rawKey)],
    ['alice bases', alice.bases.join('')],
    ['bob bases', bob.bases.join('')],
    ['bob bits', bitsToString(bob.rawKey)],
    ['match', matches],
    ['sifted alice', siftedAlice],
    ['sifted bob', bitsToString(sifted.bob)],
    ['disclosed', siftedAlice.slice(0, check.prefixLength)],
  ];
  if (check.ok) {
    rows.push(['final key', check.finalKey]);
  }
  return rows.map(([label, value]) => `${label.padEnd(13)}${value}`);
}

export function createCLI(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name('bb84')
    .description('BB84 quantum key distribution simulator with a repeating-key XOR cipher')
    .version(VERSION)
    .option('-v, --verbose', 'Log protocol stages to stderr');

  const makeGenerator = (rng: RandomSource): KeyGenerator => {
    const config = configFromEnv();
    const { verbose } = program.opts<GlobalOptions>();
    const logger = createLogger({ level: verbose ? 'debug' : config.logLevel });
    return new KeyGenerator({ ...config, rng, logger });
  };

  const run = (action: () => void): void => {
    try {
      action();
    } catch (error) {
      if (!isQkdError(error)) {
        throw error;
      }
      io.err(chalk.red(`${error.code}: ${error.message}`));
      io.fail(1);
    }
  };

  // ============================================================================
  // Key Generation
  // ============================================================================

  program
    .command('keygen')
    .description('Run the BB84 exchange and print the shared key')
    .argument('<length>', 'Minimum key length in bits', parsePositiveInt)
    .option('-s, --seed <seed>', 'Seed for reproducible runs', parseSeed)
    .option('-a, --attempts <n>', 'Maximum attempts', parsePositiveInt)
    .option('-t, --trace', 'Show a single run stage by stage')
    .option('--json', 'Print machine-readable output')
    .action((length: number, options: KeygenOptions) => {
      run(() => {
        const rng = options.seed !== undefined ? seededRandom(options.seed) : cryptoRandom;
        const generator = makeGenerator(rng);

        if (options.trace) {
          const transcript = generator.run(length);
          for (const line of formatTranscript(transcript)) {
            io.out(line);
          }
          if (!transcript.check.ok) {
            io.err(chalk.red(transcript.check.error.message));
            io.fail(1);
          }
          return;
        }

        const result = generator.generateKey(length, { maxAttempts: options.attempts });
        if (options.json) {
          io.out(
            JSON.stringify(
              result.ok
                ? { ok: true, key: result.key, attempts: result.attempts }
                : { ok: false, reason: result.reason, message: result.error.message, attempts: result.attempts }
            )
          );
        } else if (result.ok) {
          io.out(result.key);
        } else {
          io.err(chalk.red(`${result.reason}: ${result.error.message}`));
        }
        if (!result.ok) {
          io.fail(1);
        }
      });
    });

  // ============================================================================
  // Cipher
  // ============================================================================

  program
    .command('encrypt')
    .description('XOR-encrypt 8-bit text; prints ciphertext as hex')
    .argument('<text>', 'Plaintext')
    .requiredOption('-k, --key <bits>', 'Key as a string of 0 and 1')
    .action((text: string, options: KeyOptions) => {
      run(() => io.out(textToHex(encrypt(text, options.key))));
    });

  program
    .command('decrypt')
    .description('Decrypt hex ciphertext produced by encrypt')
    .argument('<hex>', 'Ciphertext as hex')
    .requiredOption('-k, --key <bits>', 'Key as a string of 0 and 1')
    .action((hex: string, options: KeyOptions) => {
      run(() => io.out(decrypt(hexToText(hex), options.key)));
    });

  program
    .command('demo')
    .description('Generate a key, then encrypt and decrypt text with it')
    .argument('<text>', 'Plaintext')
    .option('-l, --length <n>', 'Minimum key length in bits', parsePositiveInt, 16)
    .option('-s, --seed <seed>', 'Seed for reproducible runs', parseSeed)
    .option('-a, --attempts <n>', 'Maximum attempts', parsePositiveInt)
    .action((text: string, options: DemoOptions) => {
      run(() => {
        const rng = options.seed !== undefined ? seededRandom(options.seed) : cryptoRandom;
        const generator = makeGenerator(rng);
        const result = generator.generateKey(options.length, { maxAttempts: options.attempts });
        if (!result.ok) {
          io.err(chalk.red(`${result.reason}: ${result.error.message}`));
          io.fail(1);
          return;
        }
        const ciphertext = encrypt(text, result.key);
        io.out(`${chalk.bold('key')}        ${result.key}`);
        io.out(`${chalk.bold('ciphertext')} ${textToHex(ciphertext)}`);
        io.out(`${chalk.bold('decrypted')}  ${decrypt(ciphertext, result.key)}`);
      });
    });

  return program;
}
