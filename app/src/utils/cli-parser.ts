/**
 * CLI argument parser
 */

import { PublicKey } from '@solana/web3.js';
import {
  CliOptions,
  ConfigurationError,
  FeedId,
  GetPriceError,
  PriceCheckMode,
  VerificationLevelError,
} from '../types';
import {
  DEFAULT_MAXIMUM_AGE,
  DEFAULT_RPC_URL,
  RECEIVER_PROGRAM_ID,
  RPC_URL_ENV_VAR,
  U64_MAX,
} from '../config/constants';
import { getFeedIdFromHex } from '../price-update/feed-id';
import { VerificationLevel } from '../price-update/verification-level';

/**
 * Validated CLI configuration
 */
export interface ReaderConfig {
  account: PublicKey;
  feedId: FeedId;
  maximumAge: bigint;
  mode: PriceCheckMode;
  verificationLevel: VerificationLevel;
  rpcUrl: string;
  programId: PublicKey;
  verbose: boolean;
  logFile: string | null;
}

/**
 * Value of a `--name=value` flag
 */
function flagValue(args: string[], name: string): string | null {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg !== undefined ? arg.slice(prefix.length) : null;
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);

  const verbose = args.includes('--verbose') || args.includes('-v');
  const help = args.includes('--help') || args.includes('-h');
  const unchecked = args.includes('--unchecked');

  // First positional argument is the price update account
  const account = args.find((a) => !a.startsWith('-')) ?? null;

  return {
    account,
    feedId: flagValue(args, 'feed-id'),
    maxAge: flagValue(args, 'max-age'),
    partialSignatures: flagValue(args, 'partial'),
    unchecked,
    rpcUrl: flagValue(args, 'rpc'),
    programId: flagValue(args, 'program-id'),
    verbose,
    logFile: flagValue(args, 'log'),
    help,
  };
}

/**
 * Validate CLI options
 */
export function validateCliOptions(options: CliOptions): string | null {
  if (!options.account) {
    return 'Missing price update account address';
  }
  if (!options.feedId) {
    return 'Missing --feed-id';
  }
  if (options.unchecked && options.partialSignatures !== null) {
    return 'Cannot combine --unchecked with --partial';
  }
  return null;
}

function parsePublicKey(value: string, what: string): PublicKey {
  try {
    return new PublicKey(value);
  } catch {
    throw new ConfigurationError(`Invalid ${what}: ${value}`);
  }
}

function parseFeedId(value: string): FeedId {
  try {
    return getFeedIdFromHex(value);
  } catch (error) {
    if (error instanceof GetPriceError) {
      throw new ConfigurationError(`Invalid --feed-id (${error.kind}): ${value}`);
    }
    throw error;
  }
}

function parseMaximumAge(value: string | null): bigint {
  if (value === null) {
    return BigInt(DEFAULT_MAXIMUM_AGE);
  }
  if (!/^\d+$/.test(value) || BigInt(value) > U64_MAX) {
    throw new ConfigurationError(`Invalid --max-age: ${value} (expected seconds as a u64)`);
  }
  return BigInt(value);
}

function parseVerificationLevel(value: string | null): VerificationLevel {
  if (value === null) {
    return VerificationLevel.FULL;
  }
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`Invalid --partial: ${value}`);
  }
  try {
    return VerificationLevel.partial(Number(value));
  } catch (error) {
    if (error instanceof VerificationLevelError) {
      throw new ConfigurationError(`Invalid --partial: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Turn parsed options into a reader configuration
 *
 * @throws ConfigurationError when an option is missing or malformed
 */
export function resolveReaderConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): ReaderConfig {
  const validationError = validateCliOptions(options);
  if (validationError || !options.account || !options.feedId) {
    throw new ConfigurationError(validationError ?? 'Invalid options');
  }

  let mode: PriceCheckMode = 'full';
  if (options.unchecked) {
    mode = 'unchecked';
  } else if (options.partialSignatures !== null) {
    mode = 'partial';
  }

  return {
    account: parsePublicKey(options.account, 'account address'),
    feedId: parseFeedId(options.feedId),
    maximumAge: parseMaximumAge(options.maxAge),
    mode,
    verificationLevel: parseVerificationLevel(options.partialSignatures),
    rpcUrl: options.rpcUrl ?? env[RPC_URL_ENV_VAR] ?? DEFAULT_RPC_URL,
    programId: options.programId
      ? parsePublicKey(options.programId, '--program-id')
      : RECEIVER_PROGRAM_ID,
    verbose: options.verbose,
    logFile: options.logFile,
  };
}

/**
 * Display usage information
 */
export function displayUsage(): void {
  console.error('Usage:');
  console.error('  price-receiver <price-update-account> --feed-id=<hex> [options]');
  console.error('');
  console.error('Options:');
  console.error('  --feed-id=<hex>            Feed id, 64 hex characters with or without 0x');
  console.error(`  --max-age=<seconds>        Maximum price age (default ${DEFAULT_MAXIMUM_AGE})`);
  console.error('  --partial=<n>              Accept updates with at least n guardian signatures');
  console.error('  --unchecked                Skip verification and age checks (unsafe)');
  console.error(`  --rpc=<url>                RPC endpoint (default $${RPC_URL_ENV_VAR} or ${DEFAULT_RPC_URL})`);
  console.error('  --program-id=<pubkey>      Receiver program owning the account');
  console.error('  --verbose, -v              Enable debug logging');
  console.error('  --log=<file>               Also write logs to the given file (appends)');
  console.error('  --help, -h                 Show this message');
  console.error('');
  console.error('Examples:');
  console.error('  price-receiver 7UVimffxr9ow1uXYxsr4LHAcV58mLzhmwaeKvJ1pjLiE \\');
  console.error('    --feed-id=0xef0d8b6fda2ceba41da15d4095d1da392a0d2f8ed0c6c7bc0f4cfac8c280b56d --max-age=30');
  console.error('  RECEIVER_RPC_URL=https://api.devnet.solana.com price-receiver <account> --feed-id=<hex> --partial=5');
}
